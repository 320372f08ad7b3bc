/**
 * 設定ファイルの型定義
 */

import type { RuleId, RuleSetting } from './diagnostic.js';

export interface DocAuditConfig {
  version: string;
  project: ProjectConfig;
  files: FilesConfig;
  rules: RulesConfig;
  codeBlocks: CodeBlocksConfig;
  assets: AssetsConfig;
  watcher: WatcherConfig;
}

export interface ProjectConfig {
  /** プロジェクト名 */
  name: string;
  /** プロジェクトルート */
  root: string;
}

export interface FilesConfig {
  /** 含めるファイルパターン（glob） */
  include: string[];
  /** 除外するファイルパターン（glob） */
  exclude: string[];
  /** .gitignoreを尊重するか */
  ignoreGitignore: boolean;
}

/** ルールIDごとの重大度 */
export type RulesConfig = Record<RuleId, RuleSetting>;

export interface CodeBlocksConfig {
  /** 言語未指定のコードブロックも報告するか */
  requireLanguage: boolean;
  /** 組み込みリストに加えて認識する言語 */
  extraLanguages: string[];
}

export interface AssetsConfig {
  /** '/'で始まる画像パスの探索先（プロジェクトルートからの相対パス） */
  publicDirs: string[];
}

export interface WatcherConfig {
  /** デバウンス時間（ミリ秒） */
  debounceMs: number;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: DocAuditConfig = {
  version: '1.0',
  project: {
    name: '',
    root: '.',
  },
  files: {
    include: ['**/*.md', '**/*.mdx'],
    exclude: ['**/node_modules/**', '**/.git/**', '**/dist/**', '**/build/**'],
    ignoreGitignore: true,
  },
  rules: {
    'front-matter': 'error',
    'date-order': 'error',
    'code-language': 'error',
    'image-exists': 'error',
    'broken-link': 'error',
    footnotes: 'error',
    'math-delimiters': 'error',
    'duplicate-title': 'warn',
  },
  codeBlocks: {
    requireLanguage: false,
    extraLanguages: [],
  },
  assets: {
    publicDirs: ['.', 'public', 'static'],
  },
  watcher: {
    debounceMs: 300,
  },
};
