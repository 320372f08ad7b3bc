import * as watcher from '@parcel/watcher';
import { EventEmitter } from 'events';
import * as path from 'path';
import type { FilesConfig, WatcherConfig } from '@doc-audit/types';
import { FileDiscovery } from './file-discovery.js';

export interface FileWatcherOptions {
  /** プロジェクトルート */
  rootDir: string;
  /** ファイル検索設定 */
  filesConfig: FilesConfig;
  /** ファイル監視設定 */
  watcherConfig: WatcherConfig;
}

export type FileChangeType = 'add' | 'change' | 'unlink';

export interface FileChangeEvent {
  type: FileChangeType;
  /** プロジェクトルートからの相対パス */
  path: string;
  timestamp: Date;
}

/** 常に監視対象外とするディレクトリ */
const COMMON_IGNORES = [
  '**/node_modules/**',
  '**/.git/**',
  '**/dist/**',
  '**/build/**',
  '**/.cache/**',
  '**/coverage/**',
];

/**
 * ファイル監視クラス
 * @parcel/watcherを使用して記事ファイルの変更を監視し、デバウンスしてchangeイベントを発行する
 */
export class FileWatcher extends EventEmitter {
  private subscription: watcher.AsyncSubscription | null = null;
  private debounceTimers = new Map<string, NodeJS.Timeout>();
  private rootDir: string;
  private filesConfig: FilesConfig;
  private watcherConfig: WatcherConfig;
  private discovery: FileDiscovery;

  constructor(options: FileWatcherOptions) {
    super();
    this.rootDir = path.resolve(options.rootDir);
    this.filesConfig = options.filesConfig;
    this.watcherConfig = options.watcherConfig;
    this.discovery = new FileDiscovery({ rootDir: this.rootDir, config: this.filesConfig });
  }

  /**
   * 監視を開始
   */
  async start(): Promise<void> {
    if (this.filesConfig.ignoreGitignore) {
      await this.discovery.loadGitignore();
    }

    this.subscription = await watcher.subscribe(
      this.rootDir,
      (err, events) => {
        if (err) {
          this.emit('error', err);
          return;
        }

        for (const event of events) {
          const relativePath = this.toRelativePath(event.path);
          if (this.discovery.shouldIgnore(relativePath)) {
            continue;
          }

          this.handleFileEvent(this.convertEventType(event.type), relativePath);
        }
      },
      {
        ignore: [...COMMON_IGNORES, ...this.filesConfig.exclude],
      }
    );

    this.emit('ready');
  }

  /**
   * 監視を停止
   */
  async stop(): Promise<void> {
    for (const timer of this.debounceTimers.values()) {
      clearTimeout(timer);
    }
    this.debounceTimers.clear();

    if (this.subscription) {
      await this.subscription.unsubscribe();
      this.subscription = null;
    }
  }

  private toRelativePath(filePath: string): string {
    return path.relative(this.rootDir, filePath).split(path.sep).join('/');
  }

  /**
   * @parcel/watcherのイベントタイプを変換
   */
  private convertEventType(type: watcher.EventType): FileChangeType {
    switch (type) {
      case 'create':
        return 'add';
      case 'delete':
        return 'unlink';
      default:
        return 'change';
    }
  }

  /**
   * ファイルイベントを処理（デバウンス付き）
   * 同じパスへの連続イベントは最後の1件にまとめる
   */
  private handleFileEvent(type: FileChangeType, relativePath: string): void {
    const existingTimer = this.debounceTimers.get(relativePath);
    if (existingTimer) {
      clearTimeout(existingTimer);
    }

    const timer = setTimeout(() => {
      this.debounceTimers.delete(relativePath);

      const event: FileChangeEvent = {
        type,
        path: relativePath,
        timestamp: new Date(),
      };

      this.emit('change', event);
    }, this.watcherConfig.debounceMs);

    this.debounceTimers.set(relativePath, timer);
  }
}
