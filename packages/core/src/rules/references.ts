/**
 * 画像・リンク参照のパス解決
 * パスはすべてプロジェクトルートからの相対パス（POSIX形式）で扱う
 */

import * as path from 'path';

const SCHEME = /^[a-z][a-z0-9+.-]*:/i;

/**
 * 外部参照か（http:, mailto:, data:, //host など）
 */
export function isExternalReference(reference: string): boolean {
  return SCHEME.test(reference) || reference.startsWith('//');
}

/**
 * クエリ文字列とフラグメントを除去し、パーセントエンコーディングを解除
 */
export function stripReference(reference: string): string {
  const [withoutFragment] = reference.split('#');
  const [target] = withoutFragment.split('?');

  try {
    return decodeURIComponent(target);
  } catch {
    // 不正なエスケープはそのまま扱う
    return target;
  }
}

/**
 * 文書のディレクトリを基準に相対参照を解決
 */
export function resolveFromDocument(documentPath: string, target: string): string {
  return path.posix.normalize(path.posix.join(path.posix.dirname(documentPath), target));
}

/**
 * ディレクトリを基準に解決（'/'始まりの参照用）
 */
export function resolveFromDirectory(directory: string, target: string): string {
  return path.posix.normalize(path.posix.join(directory, target.replace(/^\/+/, '')));
}

/**
 * 解決したパスがプロジェクトルートの外を指しているか
 */
export function escapesRoot(resolved: string): boolean {
  return resolved === '..' || resolved.startsWith('../') || path.posix.isAbsolute(resolved);
}
