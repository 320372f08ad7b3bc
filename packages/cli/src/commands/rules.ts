/**
 * rules コマンド
 * ルールと現在の設定値を一覧表示する
 */

import { ALL_RULES } from '@doc-audit/core';
import { formatRulesAsText, parseFormat, type RuleSummary } from '../utils/output.js';
import { resolveProject, type ProjectOptions } from '../utils/project.js';

export interface RulesCommandOptions extends ProjectOptions {
  format?: string;
}

export async function runRules(options: RulesCommandOptions = {}): Promise<string> {
  const format = parseFormat(options.format);
  const { config } = await resolveProject(options);

  const rules: RuleSummary[] = ALL_RULES.map((rule) => ({
    id: rule.id,
    setting: config.rules[rule.id],
    description: rule.description,
  }));

  return format === 'json' ? JSON.stringify(rules, null, 2) : formatRulesAsText(rules);
}

export async function executeRules(options: RulesCommandOptions): Promise<void> {
  try {
    console.log(await runRules(options));
  } catch (error) {
    console.error(`エラー: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
