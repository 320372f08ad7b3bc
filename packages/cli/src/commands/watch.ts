/**
 * watch コマンド
 * 初回の検査後、記事ファイルの変更ごとに再検査する
 */

import { ContentLinter, FileWatcher, LintScheduler, type FileChangeEvent } from '@doc-audit/core';
import { formatReportAsText } from '../utils/output.js';
import { resolveProject, type ProjectOptions } from '../utils/project.js';

export type WatchCommandOptions = ProjectOptions;

/**
 * watch コマンドを実行
 * Ctrl-C（SIGINT）で監視を停止して終了する
 */
export async function executeWatch(options: WatchCommandOptions): Promise<void> {
  try {
    const { config, configPath, projectRoot } = await resolveProject(options);

    console.log(`[Watch] Project root: ${projectRoot}`);
    console.log(`[Watch] Config: ${configPath ?? '(default)'}`);

    const linter = new ContentLinter({ rootDir: projectRoot, config });
    const scheduler = new LintScheduler(async () => {
      const report = await linter.lint();
      console.log(formatReportAsText(report));
    });

    const watcher = new FileWatcher({
      rootDir: projectRoot,
      filesConfig: config.files,
      watcherConfig: config.watcher,
    });

    watcher.on('change', (event: FileChangeEvent) => {
      console.log(`[Watch] File ${event.type}: ${event.path}`);
      scheduler.trigger();
    });
    watcher.on('error', (error: unknown) => {
      console.error('[Watch] File watcher error:', error);
    });

    scheduler.trigger();
    await scheduler.waitForIdle();

    await watcher.start();
    console.log('[Watch] Watching for changes (Ctrl-C to stop)');

    process.once('SIGINT', () => {
      console.log('\n[Watch] Stopping...');
      watcher
        .stop()
        .then(() => scheduler.waitForIdle())
        .then(
          () => process.exit(0),
          (error: unknown) => {
            console.error('[Watch] Failed to stop watcher:', error);
            process.exit(1);
          }
        );
    });
  } catch (error) {
    console.error(`エラー: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
