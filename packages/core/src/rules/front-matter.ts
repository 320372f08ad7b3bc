/**
 * front-matterに関するルール
 */

import type { DocumentRule } from './types.js';

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export const frontMatterRule: DocumentRule = {
  id: 'front-matter',
  title: 'Valid front-matter',
  description: 'front-matterが存在し、key-value形式で必須フィールド（title, date）を持つ',
  scope: 'document',
  check: (document) => {
    if (document.frontMatter.ok) {
      return [];
    }

    return document.frontMatter.issues.map((issue) => ({
      path: document.path,
      line: issue.line,
      message: issue.message,
    }));
  },
};

export const dateOrderRule: DocumentRule = {
  id: 'date-order',
  title: 'Edit date after publish date',
  description: 'editedAt（updatedAt）がpublishedAt（date）以降である',
  scope: 'document',
  check: (document) => {
    const { frontMatter } = document;
    if (!frontMatter.ok) {
      return [];
    }

    const { publishedAt, editedAt } = frontMatter.data;
    if (editedAt === undefined || editedAt.getTime() >= publishedAt.getTime()) {
      return [];
    }

    return [
      {
        path: document.path,
        line: frontMatter.line,
        message: `editedAt (${formatDate(editedAt)}) is earlier than publishedAt (${formatDate(publishedAt)})`,
      },
    ];
  },
};
