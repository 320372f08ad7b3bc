/**
 * @doc-audit/types
 * doc-auditの共通型定義
 */

// Document
export type {
  Document,
  FrontMatter,
  FrontMatterIssue,
  FrontMatterResult,
  CodeBlockRef,
  ImageRef,
  LinkRef,
  FootnoteRef,
  HeadingRef,
  DocumentOutline,
  CatalogEntry,
} from './document.js';

// Diagnostic
export type { RuleId, Severity, RuleSetting, Diagnostic, LintReport } from './diagnostic.js';
export { RULE_IDS } from './diagnostic.js';

// Config
export type {
  DocAuditConfig,
  ProjectConfig,
  FilesConfig,
  RulesConfig,
  CodeBlocksConfig,
  AssetsConfig,
  WatcherConfig,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  CONFIG_ENV_VAR,
  validateConfig,
  type ResolveConfigOptions,
  type ResolvedConfig,
  type DocAuditConfigFile,
} from './config/index.js';

// Errors
export { isErrnoException, isNotFoundError } from './errors.js';
