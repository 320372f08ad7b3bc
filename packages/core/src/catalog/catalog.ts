/**
 * 記事一覧の作成
 */

import type { CatalogEntry, Document } from '@doc-audit/types';

export interface CatalogOptions {
  /** 指定したタグを持つ記事のみ（大文字小文字を区別しない） */
  tag?: string;
}

/**
 * front-matterが有効な文書から記事一覧を作成
 * 公開日の新しい順、同日はパス順
 */
export function buildCatalog(documents: Document[], options: CatalogOptions = {}): CatalogEntry[] {
  const tag = options.tag?.trim().toLowerCase();
  const entries: CatalogEntry[] = [];

  for (const document of documents) {
    if (!document.frontMatter.ok) {
      continue;
    }

    const { title, tags, publishedAt, editedAt } = document.frontMatter.data;
    if (tag && !tags.some((candidate) => candidate.toLowerCase() === tag)) {
      continue;
    }

    const entry: CatalogEntry = { path: document.path, title, tags, publishedAt };
    if (editedAt) {
      entry.editedAt = editedAt;
    }
    entries.push(entry);
  }

  return entries.sort((a, b) => {
    const byDate = b.publishedAt.getTime() - a.publishedAt.getTime();
    if (byDate !== 0) {
      return byDate;
    }
    return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
  });
}
