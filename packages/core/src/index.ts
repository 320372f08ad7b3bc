/**
 * @doc-audit/core
 * 記事ファイルの解析と検査
 */

export * from './parser/index.js';
export * from './rules/index.js';
export * from './linter/index.js';
export { buildCatalog, type CatalogOptions } from './catalog/catalog.js';
export { FileDiscovery, type FileDiscoveryOptions } from './discovery/file-discovery.js';
export {
  FileWatcher,
  type FileWatcherOptions,
  type FileChangeEvent,
  type FileChangeType,
} from './discovery/file-watcher.js';
