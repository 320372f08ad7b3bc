/**
 * ContentLinter
 * 記事ファイルを読み込み、有効なルールを適用して診断結果をまとめる
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  isErrnoException,
  type DocAuditConfig,
  type Diagnostic,
  type Document,
  type LintReport,
  type Severity,
} from '@doc-audit/types';
import { FileDiscovery } from '../discovery/file-discovery.js';
import { loadDocument } from '../parser/document-loader.js';
import { ALL_RULES } from '../rules/registry.js';
import type { CollectionRule, DocumentRule, RuleContext, RuleDefinition, RuleFinding } from '../rules/types.js';

/** 同時に読み込む文書数 */
const BATCH_SIZE = 16;

export interface ContentLinterOptions {
  /** プロジェクトルート */
  rootDir: string;
  config: DocAuditConfig;
  /** 適用するルール（省略時は全ルール） */
  rules?: RuleDefinition[];
}

interface EnabledRule<R extends RuleDefinition> {
  rule: R;
  severity: Severity;
}

/**
 * プロジェクトルートからの相対パス（POSIX形式）に正規化
 */
export function normalizeDocumentPath(documentPath: string): string {
  return path.posix.normalize(documentPath.split(path.sep).join('/')).replace(/^\.\//, '');
}

/**
 * 診断結果をパス、行番号、ルールIDの順に並べる
 */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  if (a.path !== b.path) {
    return a.path < b.path ? -1 : 1;
  }
  const lineA = a.line ?? 0;
  const lineB = b.line ?? 0;
  if (lineA !== lineB) {
    return lineA - lineB;
  }
  if (a.ruleId !== b.ruleId) {
    return a.ruleId < b.ruleId ? -1 : 1;
  }
  return 0;
}

async function inBatches<T, R>(items: T[], fn: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = [];
  for (let i = 0; i < items.length; i += BATCH_SIZE) {
    const batch = items.slice(i, i + BATCH_SIZE);
    results.push(...(await Promise.all(batch.map(fn))));
  }
  return results;
}

export class ContentLinter {
  private rootDir: string;
  private config: DocAuditConfig;
  private rules: RuleDefinition[];
  private discovery: FileDiscovery;

  constructor(options: ContentLinterOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.config = options.config;
    this.rules = options.rules ?? ALL_RULES;
    this.discovery = new FileDiscovery({ rootDir: this.rootDir, config: this.config.files });
  }

  /**
   * 文書を読み込む
   * @param paths プロジェクトルートからの相対パス（省略時はファイル検索の結果すべて）
   */
  async loadDocuments(paths?: string[]): Promise<Document[]> {
    const targets = paths ? paths.map(normalizeDocumentPath) : await this.discovery.findFiles();
    return inBatches(targets, (documentPath) => loadDocument(this.rootDir, documentPath));
  }

  /**
   * 文書を検査
   * pathsを指定した場合もduplicate-titleは全文書を対象に判定し、指定した文書の結果のみ報告する
   */
  async lint(paths?: string[]): Promise<LintReport> {
    const startTime = Date.now();

    const collection = await this.loadDocuments();
    let targets = collection;

    if (paths) {
      const requested = [...new Set(paths.map(normalizeDocumentPath))];
      const loaded = new Map(collection.map((document) => [document.path, document]));
      const missing = requested.filter((documentPath) => !loaded.has(documentPath));

      // 検索対象外のファイルを明示的に指定された場合は個別に読み込む
      for (const document of await this.loadDocuments(missing)) {
        loaded.set(document.path, document);
        collection.push(document);
      }

      targets = requested.flatMap((documentPath) => {
        const document = loaded.get(documentPath);
        return document ? [document] : [];
      });
    }

    const context = this.createContext();
    const documentRules = this.enabledRules().filter(
      (entry): entry is EnabledRule<DocumentRule> => entry.rule.scope === 'document'
    );
    const collectionRules = this.enabledRules().filter(
      (entry): entry is EnabledRule<CollectionRule> => entry.rule.scope === 'collection'
    );

    const diagnostics: Diagnostic[] = [];

    const perDocument = await inBatches(targets, async (document) => {
      const results: Diagnostic[] = [];
      for (const { rule, severity } of documentRules) {
        const findings = await rule.check(document, context);
        results.push(...findings.map((finding) => toDiagnostic(rule, severity, finding)));
      }
      return results;
    });
    for (const results of perDocument) {
      diagnostics.push(...results);
    }

    const targetPaths = new Set(targets.map((document) => document.path));
    for (const { rule, severity } of collectionRules) {
      for (const finding of rule.check(collection, context)) {
        if (targetPaths.has(finding.path)) {
          diagnostics.push(toDiagnostic(rule, severity, finding));
        }
      }
    }

    diagnostics.sort(compareDiagnostics);

    return {
      documentCount: targets.length,
      diagnostics,
      errorCount: diagnostics.filter((diagnostic) => diagnostic.severity === 'error').length,
      warningCount: diagnostics.filter((diagnostic) => diagnostic.severity === 'warn').length,
      took: Date.now() - startTime,
    };
  }

  /**
   * 設定で'off'になっていないルールと重要度
   */
  private enabledRules(): EnabledRule<RuleDefinition>[] {
    const enabled: EnabledRule<RuleDefinition>[] = [];
    for (const rule of this.rules) {
      const setting = this.config.rules[rule.id];
      if (setting !== 'off') {
        enabled.push({ rule, severity: setting });
      }
    }
    return enabled;
  }

  /**
   * ルールに渡すコンテキストを作成
   * ファイルの存在確認は1回の検査の間キャッシュする
   */
  private createContext(): RuleContext {
    const cache = new Map<string, Promise<boolean>>();

    const fileExists = (relativePath: string): Promise<boolean> => {
      let result = cache.get(relativePath);
      if (!result) {
        result = fs.stat(path.join(this.rootDir, relativePath)).then(
          () => true,
          (error: unknown) => {
            if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
              return false;
            }
            throw error;
          }
        );
        cache.set(relativePath, result);
      }
      return result;
    };

    return { config: this.config, fileExists };
  }
}

function toDiagnostic(rule: RuleDefinition, severity: Severity, finding: RuleFinding): Diagnostic {
  const diagnostic: Diagnostic = {
    ruleId: rule.id,
    severity,
    path: finding.path,
    message: finding.message,
  };
  if (finding.line !== undefined) {
    diagnostic.line = finding.line;
  }
  return diagnostic;
}
