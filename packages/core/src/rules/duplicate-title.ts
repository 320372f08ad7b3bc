/**
 * 文書間のタイトル重複
 */

import type { Document } from '@doc-audit/types';
import type { CollectionRule, RuleFinding } from './types.js';

/**
 * 比較用にタイトルを正規化（NFKC、空白の圧縮、小文字化）
 */
export function normalizeTitle(title: string): string {
  return title.normalize('NFKC').trim().replace(/\s+/g, ' ').toLowerCase();
}

export const duplicateTitleRule: CollectionRule = {
  id: 'duplicate-title',
  title: 'Unique titles',
  description: '同じタイトル（正規化後）を持つ文書が複数ない',
  scope: 'collection',
  check: (documents) => {
    const groups = new Map<string, Document[]>();

    for (const document of documents) {
      if (!document.frontMatter.ok) {
        continue;
      }
      const key = normalizeTitle(document.frontMatter.data.title);
      const group = groups.get(key);
      if (group) {
        group.push(document);
      } else {
        groups.set(key, [document]);
      }
    }

    const findings: RuleFinding[] = [];
    for (const group of groups.values()) {
      if (group.length < 2) {
        continue;
      }

      for (const document of group) {
        if (!document.frontMatter.ok) {
          continue;
        }
        const others = group
          .filter((other) => other !== document)
          .map((other) => other.path)
          .sort();
        findings.push({
          path: document.path,
          line: document.frontMatter.line,
          message: `title "${document.frontMatter.data.title}" is also used by ${others.join(', ')}`,
        });
      }
    }

    return findings;
  },
};
