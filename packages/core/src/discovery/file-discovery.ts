/**
 * 記事ファイルの検索
 */

import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import { minimatch } from 'minimatch';
import ignoreModule, { type Ignore } from 'ignore';
import { isNotFoundError, type FilesConfig } from '@doc-audit/types';

// CommonJSパッケージのため、default importはmodule.exports（defaultにファクトリ自身を持つ）になる
const createIgnore = ignoreModule.default;

export interface FileDiscoveryOptions {
  /** プロジェクトルート */
  rootDir: string;
  /** ファイル検索設定 */
  config: FilesConfig;
}

/**
 * パターンにマッチするか
 * minimatchは**\/patternがルートレベルにマッチしないため、先頭の**\/を外した形も試す
 */
function matchesGlob(filePath: string, pattern: string): boolean {
  if (pattern.startsWith('**/')) {
    return minimatch(filePath, pattern) || minimatch(filePath, pattern.slice(3));
  }
  return minimatch(filePath, pattern);
}

/**
 * ディレクトリ配下か（空文字列はプロジェクトルート）
 */
function isUnder(filePath: string, directory: string): boolean {
  return directory === '' || filePath.startsWith(`${directory.replace(/\/+$/, '')}/`);
}

/**
 * 記事ファイル検索クラス
 * include/excludeのGlobパターンと.gitignoreで対象を決める
 * パスはすべてプロジェクトルートからの相対パス（POSIX形式）
 */
export class FileDiscovery {
  private rootDir: string;
  private config: FilesConfig;
  /** .gitignoreの内容（未読み込みならnull、ファイルがなければ空） */
  private gitignore: Ignore | null = null;

  constructor(options: FileDiscoveryOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.config = options.config;
  }

  /**
   * 記事ファイルを検索
   * @param directory 指定した場合はそのディレクトリ配下のみ
   * @returns ソート済みの相対パス
   */
  async findFiles(directory: string = ''): Promise<string[]> {
    if (this.config.ignoreGitignore) {
      await this.loadGitignore();
    }

    const files = await fg(this.config.include, {
      cwd: this.rootDir,
      ignore: this.config.exclude,
      onlyFiles: true,
      dot: false,
    });

    return files
      .filter((file) => isUnder(file, directory) && !this.isGitignored(file))
      .sort();
  }

  /**
   * パスがinclude/excludeパターンに合うか
   */
  matchesPattern(filePath: string): boolean {
    return (
      this.config.include.some((pattern) => matchesGlob(filePath, pattern)) &&
      !this.config.exclude.some((pattern) => matchesGlob(filePath, pattern))
    );
  }

  /**
   * 記事ファイルとして扱わないパスか
   * .gitignoreはloadGitignore()またはfindFiles()の後に反映される
   */
  shouldIgnore(filePath: string): boolean {
    return this.isGitignored(filePath) || !this.matchesPattern(filePath);
  }

  /**
   * プロジェクトルートの.gitignoreを読み込む（存在しなければ何もしない）
   */
  async loadGitignore(): Promise<void> {
    let content = '';
    try {
      content = await fs.readFile(path.join(this.rootDir, '.gitignore'), 'utf-8');
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
    }
    this.gitignore = createIgnore().add(content);
  }

  private isGitignored(filePath: string): boolean {
    if (!this.config.ignoreGitignore || !this.gitignore || filePath === '') {
      return false;
    }
    return this.gitignore.ignores(filePath);
  }
}
