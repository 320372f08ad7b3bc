#!/usr/bin/env node
/**
 * doc-audit CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { CONFIG_ENV_VAR } from '@doc-audit/types';
import { executeCheck, type CheckCommandOptions } from './commands/check.js';
import { executeList, type ListCommandOptions } from './commands/list.js';
import { executeRules, type RulesCommandOptions } from './commands/rules.js';

// package.jsonからバージョンを読み込む
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as {
  version: string;
};

/**
 * グローバル設定（preSubcommandフックで設定）
 */
let globalConfigPath: string | undefined;

const program = new Command();

program
  .name('doc-audit')
  .description('Markdown記事の検査ツール')
  .version(packageJson.version)
  .addOption(new Option('-c, --config <path>', '設定ファイルのパス').env(CONFIG_ENV_VAR))
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string }>();
    globalConfigPath = opts.config;
  });

// check コマンド
program
  .command('check')
  .description('記事を検査（エラーがあれば終了コード1）')
  .argument('[paths...]', '検査するファイルまたはディレクトリ（省略時は全記事）')
  .option('--format <format>', '出力形式 (text, json)', 'text')
  .option('--max-warnings <n>', '許容する警告数')
  .option('--quiet', 'エラーのみ出力')
  .action((paths: string[], options: CheckCommandOptions) => {
    void executeCheck(paths, { ...options, config: globalConfigPath });
  });

// list コマンド
program
  .command('list')
  .description('記事一覧を公開日の新しい順に表示')
  .option('--tag <tag>', 'タグで絞り込み')
  .option('--format <format>', '出力形式 (text, json)', 'text')
  .action((options: ListCommandOptions) => {
    void executeList({ ...options, config: globalConfigPath });
  });

// watch コマンド
program
  .command('watch')
  .description('記事の変更を監視して再検査')
  .action(async () => {
    const { executeWatch } = await import('./commands/watch.js');
    await executeWatch({ config: globalConfigPath });
  });

// rules コマンド
program
  .command('rules')
  .description('ルールと現在の設定値を表示')
  .option('--format <format>', '出力形式 (text, json)', 'text')
  .action((options: RulesCommandOptions) => {
    void executeRules({ ...options, config: globalConfigPath });
  });

// config コマンド
const configCmd = program.command('config').description('設定管理');

configCmd
  .command('init')
  .description('設定ファイルを初期化')
  .option('-f, --force', '既存ファイルを上書き')
  .action(async (options: { force?: boolean }) => {
    const { executeConfigInit } = await import('./commands/config/init.js');
    await executeConfigInit(options);
  });

// コマンドラインを解析
program.parse(process.argv);
