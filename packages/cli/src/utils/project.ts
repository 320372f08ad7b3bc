/**
 * プロジェクト解決ユーティリティ
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { FileDiscovery } from '@doc-audit/core';
import { ConfigLoader, type ResolvedConfig } from '@doc-audit/types';

export interface ProjectOptions {
  /** 設定ファイルのパス */
  config?: string;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
  /** 環境変数（テスト用、デフォルト: process.env） */
  env?: NodeJS.ProcessEnv;
}

/**
 * 設定ファイルとプロジェクトルートを解決
 */
export async function resolveProject(options: ProjectOptions = {}): Promise<ResolvedConfig> {
  return ConfigLoader.resolve({
    configPath: options.config,
    cwd: options.cwd,
    env: options.env,
  });
}

/**
 * コマンドラインで指定されたパスをプロジェクトルートからの相対パスに変換
 * プロジェクトルート自身は空文字列になる
 * @throws プロジェクトルートの外を指している場合
 */
export async function toProjectPaths(
  projectRoot: string,
  paths: string[],
  cwd: string = process.cwd()
): Promise<string[]> {
  const base = await fs.realpath(cwd);

  return paths.map((input) => {
    const relative = path.relative(projectRoot, path.resolve(base, input));
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new Error(`Path is outside the project root: ${input}`);
    }
    return relative.split(path.sep).join('/');
  });
}

/**
 * 指定パスを記事ファイルのパスに展開
 * ディレクトリはその配下で検索された記事ファイルに置き換える
 */
export async function expandProjectPaths(
  projectRoot: string,
  relativePaths: string[],
  discovery: FileDiscovery
): Promise<string[]> {
  const expanded: string[] = [];

  for (const relativePath of relativePaths) {
    const stat = await fs.stat(path.join(projectRoot, relativePath));
    if (stat.isDirectory()) {
      expanded.push(...(await discovery.findFiles(relativePath)));
    } else {
      expanded.push(relativePath);
    }
  }

  return [...new Set(expanded)];
}
