/**
 * check コマンド
 */

import { ContentLinter, FileDiscovery } from '@doc-audit/core';
import type { LintReport } from '@doc-audit/types';
import { formatReportAsJson, formatReportAsText, parseFormat } from '../utils/output.js';
import { expandProjectPaths, resolveProject, toProjectPaths, type ProjectOptions } from '../utils/project.js';

export interface CheckCommandOptions extends ProjectOptions {
  format?: string;
  /** 許容する警告数（超えた場合は失敗） */
  maxWarnings?: string;
  /** エラーのみ出力 */
  quiet?: boolean;
}

export interface CheckResult {
  report: LintReport;
  output: string;
  exitCode: number;
}

function parseMaxWarnings(value: string | undefined): number | null {
  if (value === undefined) {
    return null;
  }
  if (!/^\d+$/.test(value)) {
    throw new Error(`--max-warnings must be a non-negative integer: ${value}`);
  }
  return parseInt(value, 10);
}

/**
 * 警告を除いたレポート（--quiet）
 */
function errorsOnly(report: LintReport): LintReport {
  return {
    ...report,
    diagnostics: report.diagnostics.filter((diagnostic) => diagnostic.severity === 'error'),
    warningCount: 0,
  };
}

/**
 * 検査を実行し、出力と終了コードを返す
 * 終了コードはエラーがあるか、警告が--max-warningsを超えた場合に1
 */
export async function runCheck(paths: string[], options: CheckCommandOptions = {}): Promise<CheckResult> {
  const format = parseFormat(options.format);
  const maxWarnings = parseMaxWarnings(options.maxWarnings);

  const { config, projectRoot } = await resolveProject(options);
  const linter = new ContentLinter({ rootDir: projectRoot, config });

  let targets: string[] | undefined;
  if (paths.length > 0) {
    const discovery = new FileDiscovery({ rootDir: projectRoot, config: config.files });
    const relativePaths = await toProjectPaths(projectRoot, paths, options.cwd);
    targets = await expandProjectPaths(projectRoot, relativePaths, discovery);
  }

  const report = await linter.lint(targets);

  const failed = report.errorCount > 0 || (maxWarnings !== null && report.warningCount > maxWarnings);
  const shown = options.quiet ? errorsOnly(report) : report;
  const output = format === 'json' ? formatReportAsJson(shown) : formatReportAsText(shown);

  return { report, output, exitCode: failed ? 1 : 0 };
}

/**
 * check コマンドを実行
 */
export async function executeCheck(paths: string[], options: CheckCommandOptions): Promise<void> {
  try {
    const result = await runCheck(paths, options);
    console.log(result.output);
    process.exitCode = result.exitCode;
  } catch (error) {
    console.error(`エラー: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
