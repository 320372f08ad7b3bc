/**
 * 画像参照の存在確認
 */

import {
  escapesRoot,
  isExternalReference,
  resolveFromDirectory,
  resolveFromDocument,
  stripReference,
} from './references.js';
import type { DocumentRule, RuleContext, RuleFinding } from './types.js';

/**
 * 画像の候補パスを列挙
 * '/'始まりは公開ディレクトリ（assets.publicDirs）を、それ以外は文書のディレクトリを基準にする
 */
function candidatePaths(documentPath: string, target: string, context: RuleContext): string[] {
  if (target.startsWith('/')) {
    return context.config.assets.publicDirs.map((dir) => resolveFromDirectory(dir, target));
  }
  return [resolveFromDocument(documentPath, target)];
}

export const imageExistsRule: DocumentRule = {
  id: 'image-exists',
  title: 'Image exists',
  description: '画像参照がリポジトリ内の既存ファイルを指している',
  scope: 'document',
  check: async (document, context) => {
    const findings: RuleFinding[] = [];

    for (const image of document.outline.images) {
      if (isExternalReference(image.src)) {
        continue;
      }

      const target = stripReference(image.src);
      if (target === '') {
        continue;
      }

      const candidates = candidatePaths(document.path, target, context);
      const inside = candidates.filter((candidate) => !escapesRoot(candidate));

      if (inside.length === 0) {
        findings.push({
          path: document.path,
          line: image.line,
          message: `image path points outside the repository: ${image.src}`,
        });
        continue;
      }

      const exists = await Promise.all(inside.map((candidate) => context.fileExists(candidate)));
      if (!exists.includes(true)) {
        findings.push({
          path: document.path,
          line: image.line,
          message: `image not found: ${image.src}`,
        });
      }
    }

    return findings;
  },
};
