/**
 * list コマンド
 */

import { ContentLinter, buildCatalog } from '@doc-audit/core';
import { formatCatalogAsJson, formatCatalogAsText, parseFormat } from '../utils/output.js';
import { resolveProject, type ProjectOptions } from '../utils/project.js';

export interface ListCommandOptions extends ProjectOptions {
  tag?: string;
  format?: string;
}

/**
 * 記事一覧を作成して出力文字列を返す
 * front-matterが不正な文書は含めない
 */
export async function runList(options: ListCommandOptions = {}): Promise<string> {
  const format = parseFormat(options.format);
  const { config, projectRoot } = await resolveProject(options);

  const linter = new ContentLinter({ rootDir: projectRoot, config });
  const documents = await linter.loadDocuments();
  const entries = buildCatalog(documents, { tag: options.tag });

  return format === 'json' ? formatCatalogAsJson(entries) : formatCatalogAsText(entries);
}

/**
 * list コマンドを実行
 */
export async function executeList(options: ListCommandOptions): Promise<void> {
  try {
    console.log(await runList(options));
  } catch (error) {
    console.error(`エラー: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
