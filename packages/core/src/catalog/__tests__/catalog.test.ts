import { describe, it, expect } from 'vitest';
import { buildCatalog } from '../catalog.js';
import { parseDocument } from '../../parser/document-loader.js';

const article = (path: string, title: string, date: string, tags: string[] = [], updatedAt?: string) =>
  parseDocument(
    path,
    [
      '---',
      `title: ${title}`,
      `date: ${date}`,
      ...(updatedAt ? [`updatedAt: ${updatedAt}`] : []),
      `tags: [${tags.join(', ')}]`,
      '---',
      'Body',
    ].join('\n')
  );

describe('buildCatalog', () => {
  const documents = [
    article('posts/lambda.md', 'Lambda calculus', '2020-05-01', ['lambda']),
    article('posts/y.md', 'Inventing the Y-Combinator', '2021-03-01', ['lambda', 'Haskell'], '2021-04-10'),
    article('posts/tidy.md', 'Tidy processes', '2021-03-01', ['process']),
    parseDocument('notes.md', 'No front matter'),
  ];

  it('有効な文書を公開日の新しい順、同日はパス順に並べる', () => {
    const catalog = buildCatalog(documents);

    expect(catalog.map((entry) => entry.path)).toEqual(['posts/tidy.md', 'posts/y.md', 'posts/lambda.md']);
    expect(catalog[1]).toEqual({
      path: 'posts/y.md',
      title: 'Inventing the Y-Combinator',
      tags: ['lambda', 'Haskell'],
      publishedAt: new Date('2021-03-01'),
      editedAt: new Date('2021-04-10'),
    });
    expect(catalog[0]).not.toHaveProperty('editedAt');
  });

  it('タグで絞り込める（大文字小文字を区別しない）', () => {
    expect(buildCatalog(documents, { tag: 'haskell' }).map((entry) => entry.path)).toEqual(['posts/y.md']);
    expect(buildCatalog(documents, { tag: 'lambda' }).map((entry) => entry.path)).toEqual([
      'posts/y.md',
      'posts/lambda.md',
    ]);
    expect(buildCatalog(documents, { tag: 'missing' })).toEqual([]);
  });
});
