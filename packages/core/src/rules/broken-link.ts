/**
 * ローカルファイルへのリンク切れ
 */

import {
  escapesRoot,
  isExternalReference,
  resolveFromDocument,
  stripReference,
} from './references.js';
import type { DocumentRule, RuleFinding } from './types.js';

export const brokenLinkRule: DocumentRule = {
  id: 'broken-link',
  title: 'Local link target exists',
  description: '相対パスのリンクがリポジトリ内の既存ファイルを指している',
  scope: 'document',
  check: async (document, context) => {
    const findings: RuleFinding[] = [];

    for (const link of document.outline.links) {
      // 外部URL、ページ内アンカー、サイトのルートパスは対象外
      if (isExternalReference(link.href) || link.href.startsWith('#') || link.href.startsWith('/')) {
        continue;
      }

      const target = stripReference(link.href);
      if (target === '') {
        continue;
      }

      const resolved = resolveFromDocument(document.path, target);
      if (escapesRoot(resolved)) {
        findings.push({
          path: document.path,
          line: link.line,
          message: `link points outside the repository: ${link.href}`,
        });
        continue;
      }

      if (!(await context.fileExists(resolved))) {
        findings.push({
          path: document.path,
          line: link.line,
          message: `link target not found: ${link.href}`,
        });
      }
    }

    return findings;
  },
};
