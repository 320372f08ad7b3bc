/**
 * config init コマンド
 * 設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigLoader, isNotFoundError, type DocAuditConfig } from '@doc-audit/types';

export const DEFAULT_CONFIG_FILE = '.doc-audit.json';

export interface ConfigInitOptions {
  /** 既存ファイルを上書き */
  force?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * デフォルト設定オブジェクトを生成
 * プロジェクト名はディレクトリ名から決める
 */
function createDefaultConfig(projectRoot: string): DocAuditConfig {
  const config = ConfigLoader.getDefaultConfig();
  config.project.name = path.basename(projectRoot);
  return config;
}

/**
 * config init コマンドを実行
 * @returns 作成した設定ファイルのパス
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<string> {
  const cwd = options.cwd || process.cwd();
  const configPath = path.join(cwd, DEFAULT_CONFIG_FILE);

  console.log('Initializing doc-audit configuration...\n');

  // 既存ファイルチェック
  let exists = true;
  try {
    await fs.access(configPath);
  } catch (error) {
    if (!isNotFoundError(error)) {
      throw error;
    }
    exists = false;
  }

  if (exists) {
    if (!options.force) {
      throw new Error(
        `Configuration file already exists: ${configPath}\n` + 'Use --force to overwrite the existing file.'
      );
    }
    console.log('⚠️  Overwriting existing configuration file...\n');
  }

  const config = createDefaultConfig(cwd);

  const configContent = JSON.stringify(config, null, 2) + '\n';
  await fs.writeFile(configPath, configContent, 'utf-8');

  console.log('✅ Configuration file created successfully!\n');
  console.log(`📄 File: ${configPath}`);
  console.log(`🚀 Project: ${config.project.name}\n`);
  console.log('Next steps:');
  console.log(`  1. Review and customize ${DEFAULT_CONFIG_FILE}`);
  console.log('  2. Check documents: doc-audit check');
  console.log('  3. List articles: doc-audit list\n');

  return configPath;
}

/**
 * config init コマンドを実行（CLI用）
 */
export async function executeConfigInit(options: ConfigInitOptions): Promise<void> {
  try {
    await initConfig(options);
  } catch (error) {
    console.error(`エラー: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
