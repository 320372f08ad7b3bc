/**
 * ルール定義の型
 */

import type { DocAuditConfig, Document, RuleId } from '@doc-audit/types';

export interface RuleFinding {
  /** 文書のパス（プロジェクトルートからの相対パス） */
  path: string;
  /** ファイル内行番号（1-indexed） */
  line?: number;
  message: string;
}

export interface RuleContext {
  config: DocAuditConfig;
  /** プロジェクトルートからの相対パスでファイルの存在を確認 */
  fileExists(relativePath: string): Promise<boolean>;
}

interface RuleBase {
  id: RuleId;
  title: string;
  /** ルールが検出する問題の説明 */
  description: string;
}

/** 文書ごとに適用するルール */
export interface DocumentRule extends RuleBase {
  scope: 'document';
  check(document: Document, context: RuleContext): RuleFinding[] | Promise<RuleFinding[]>;
}

/** 文書集合全体に適用するルール */
export interface CollectionRule extends RuleBase {
  scope: 'collection';
  check(documents: Document[], context: RuleContext): RuleFinding[];
}

export type RuleDefinition = DocumentRule | CollectionRule;
