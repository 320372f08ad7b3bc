import { readFile, access, realpath } from 'fs/promises';
import * as path from 'path';
import type { DocAuditConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { isNotFoundError } from '../errors.js';
import { validateConfig, type DocAuditConfigFile } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 環境変数（テスト用、デフォルト: process.env） */
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedConfig {
  config: DocAuditConfig;
  configPath: string | null;
  projectRoot: string;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .doc-audit.json > doc-audit.json
 */
export const CONFIG_FILE_NAMES = ['.doc-audit.json', 'doc-audit.json'] as const;

/** 設定ファイルパスを指定する環境変数 */
export const CONFIG_ENV_VAR = 'DOC_AUDIT_CONFIG';

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * ファイルが存在しない場合はデフォルト設定を返す
   */
  static async load(configPath: string): Promise<DocAuditConfig> {
    const file = await this.readConfigFile(configPath);
    return file ? this.mergeWithDefaults(file) : this.getDefaultConfig();
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - プロジェクトルートの決定
   * - 設定の読み込み
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const {
      configPath: explicitPath,
      traverseUp = true,
      cwd = process.cwd(),
      env = process.env,
    } = options;

    // 1. 設定ファイルパスを解決
    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp, env);

    if (!configPath) {
      // 設定ファイルが見つからない場合はカレントディレクトリを使用
      return {
        config: this.getDefaultConfig(),
        configPath: null,
        projectRoot: await this.normalizeProjectRoot(cwd),
      };
    }

    // 2. 設定を読み込む
    const file = await this.readConfigFile(configPath);
    const config = file ? this.mergeWithDefaults(file) : this.getDefaultConfig();

    // 3. プロジェクトルートを決定
    const configDir = path.dirname(configPath);
    const explicitRoot = file?.project?.root;
    const projectRoot = await this.normalizeProjectRoot(
      explicitRoot ? path.resolve(configDir, explicitRoot) : configDir
    );

    return { config, configPath, projectRoot };
  }

  /**
   * デフォルト設定を取得
   */
  static getDefaultConfig(): DocAuditConfig {
    return this.mergeWithDefaults({});
  }

  /**
   * 設定ファイルを読み込んでバリデーション
   * @returns 存在しない場合はnull
   */
  private static async readConfigFile(configPath: string): Promise<DocAuditConfigFile | null> {
    let content: string;
    try {
      content = await readFile(configPath, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse ${configPath}: ${reason}`);
    }

    return validateConfig(parsed);
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(startDir: string, traverseUp: boolean): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      // 候補ファイルを順に試す
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      // 親ディレクトリへ
      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   * 1. 明示的に指定されたパス
   * 2. 環境変数
   * 3. 自動探索
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean,
    env: NodeJS.ProcessEnv
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = env[CONFIG_ENV_VAR];
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * プロジェクトルートを正規化
   * - 絶対パスに変換
   * - シンボリックリンクを解決
   * - 末尾のスラッシュを削除
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    const absolutePath = path.resolve(root);

    try {
      const realPath = await realpath(absolutePath);
      return realPath.replace(/\/$/, '');
    } catch (_error) {
      // ディレクトリが存在しない場合は絶対パスをそのまま返す
      return absolutePath.replace(/\/$/, '');
    }
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: DocAuditConfigFile): DocAuditConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      project: {
        name: config.project?.name ?? DEFAULT_CONFIG.project.name,
        root: config.project?.root ?? DEFAULT_CONFIG.project.root,
      },
      files: {
        include: config.files?.include ?? [...DEFAULT_CONFIG.files.include],
        exclude: config.files?.exclude ?? [...DEFAULT_CONFIG.files.exclude],
        ignoreGitignore: config.files?.ignoreGitignore ?? DEFAULT_CONFIG.files.ignoreGitignore,
      },
      rules: {
        ...DEFAULT_CONFIG.rules,
        ...config.rules,
      },
      codeBlocks: {
        requireLanguage:
          config.codeBlocks?.requireLanguage ?? DEFAULT_CONFIG.codeBlocks.requireLanguage,
        extraLanguages:
          config.codeBlocks?.extraLanguages ?? [...DEFAULT_CONFIG.codeBlocks.extraLanguages],
      },
      assets: {
        publicDirs: config.assets?.publicDirs ?? [...DEFAULT_CONFIG.assets.publicDirs],
      },
      watcher: {
        debounceMs: config.watcher?.debounceMs ?? DEFAULT_CONFIG.watcher.debounceMs,
      },
    };
  }
}
