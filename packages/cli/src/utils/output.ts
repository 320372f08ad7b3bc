/**
 * 出力フォーマットユーティリティ
 */

import type { CatalogEntry, Diagnostic, LintReport, RuleId, RuleSetting } from '@doc-audit/types';

export type OutputFormat = 'text' | 'json';

/**
 * 出力形式を検証
 */
export function parseFormat(value: string | undefined): OutputFormat {
  const format = value ?? 'text';
  if (format !== 'text' && format !== 'json') {
    throw new Error(`Unknown format: ${format} (expected text or json)`);
  }
  return format;
}

/**
 * 日付をYYYY-MM-DD形式に変換
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * 検査結果をJSON形式で出力
 */
export function formatReportAsJson(report: LintReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * 検査結果をテキスト形式で出力
 * 文書ごとにまとめ、最後に集計行を付ける
 */
export function formatReportAsText(report: LintReport): string {
  const lines: string[] = [];

  const byPath = new Map<string, Diagnostic[]>();
  for (const diagnostic of report.diagnostics) {
    const group = byPath.get(diagnostic.path);
    if (group) {
      group.push(diagnostic);
    } else {
      byPath.set(diagnostic.path, [diagnostic]);
    }
  }

  for (const [documentPath, diagnostics] of byPath) {
    lines.push(documentPath);
    for (const diagnostic of diagnostics) {
      const location = diagnostic.line === undefined ? '-' : String(diagnostic.line);
      lines.push(`  ${location}  ${diagnostic.severity}  ${diagnostic.message}  (${diagnostic.ruleId})`);
    }
    lines.push('');
  }

  lines.push(formatSummary(report));

  return lines.join('\n');
}

function formatSummary(report: LintReport): string {
  const total = report.errorCount + report.warningCount;
  if (total === 0) {
    return `問題なし: ${report.documentCount}件の文書（${report.took}ms）`;
  }
  return (
    `${report.documentCount}件の文書で${total}件の問題` +
    `（エラー${report.errorCount}件、警告${report.warningCount}件）（${report.took}ms）`
  );
}

/**
 * 記事一覧をJSON形式で出力（日付はYYYY-MM-DD）
 */
export function formatCatalogAsJson(entries: CatalogEntry[]): string {
  return JSON.stringify(
    entries.map((entry) => ({
      ...entry,
      publishedAt: formatDate(entry.publishedAt),
      editedAt: entry.editedAt ? formatDate(entry.editedAt) : undefined,
    })),
    null,
    2
  );
}

/**
 * 記事一覧をテキスト形式で出力
 */
export function formatCatalogAsText(entries: CatalogEntry[]): string {
  if (entries.length === 0) {
    return '記事: 0件';
  }

  const lines: string[] = [`記事: ${entries.length}件`, ''];
  for (const entry of entries) {
    const edited = entry.editedAt ? ` (更新: ${formatDate(entry.editedAt)})` : '';
    lines.push(`${formatDate(entry.publishedAt)}  ${entry.title}${edited}`);

    const tags = entry.tags.length > 0 ? `  [${entry.tags.join(', ')}]` : '';
    lines.push(`  ${entry.path}${tags}`);
  }

  return lines.join('\n');
}

export interface RuleSummary {
  id: RuleId;
  setting: RuleSetting;
  description: string;
}

/**
 * ルール一覧をテキスト形式で出力
 */
export function formatRulesAsText(rules: RuleSummary[]): string {
  const width = Math.max(...rules.map((rule) => rule.id.length));
  return rules
    .map((rule) => `${rule.id.padEnd(width)}  ${rule.setting.padEnd(5)}  ${rule.description}`)
    .join('\n');
}
