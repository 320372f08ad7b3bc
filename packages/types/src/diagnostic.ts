/**
 * 診断結果の型定義
 */

export const RULE_IDS = [
  'front-matter',
  'date-order',
  'code-language',
  'image-exists',
  'broken-link',
  'footnotes',
  'math-delimiters',
  'duplicate-title',
] as const;

export type RuleId = (typeof RULE_IDS)[number];

export type Severity = 'error' | 'warn';

/** ルールごとの設定値 */
export type RuleSetting = Severity | 'off';

export interface Diagnostic {
  ruleId: RuleId;
  severity: Severity;
  /** 文書のパス（プロジェクトルートからの相対パス） */
  path: string;
  /** ファイル内行番号（1-indexed）。文書全体に関する場合は省略 */
  line?: number;
  message: string;
}

export interface LintReport {
  /** 検査した文書数 */
  documentCount: number;
  diagnostics: Diagnostic[];
  errorCount: number;
  warningCount: number;
  /** 所要時間（ミリ秒） */
  took: number;
}
