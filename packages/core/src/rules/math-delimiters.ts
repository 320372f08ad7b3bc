import type { DocumentRule } from './types.js';

export const mathDelimitersRule: DocumentRule = {
  id: 'math-delimiters',
  title: 'Balanced display math',
  description: '$$で始まる数式ブロックが閉じられている',
  scope: 'document',
  check: (document) =>
    document.outline.unclosedMath.map((line) => ({
      path: document.path,
      line,
      message: 'display math opened with $$ is never closed',
    })),
};
