/**
 * 記事ファイルの読み込み
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { Document } from '@doc-audit/types';
import { parseFrontMatter } from './front-matter.js';
import { MarkdownParser } from './markdown-parser.js';

const markdownParser = new MarkdownParser();

/**
 * ソース文字列からDocumentを構築
 * @param documentPath プロジェクトルートからの相対パス
 */
export function parseDocument(documentPath: string, source: string): Document {
  const { frontMatter, body, bodyStartLine } = parseFrontMatter(source);

  return {
    path: documentPath,
    frontMatter,
    body,
    bodyStartLine,
    outline: markdownParser.parse(body, bodyStartLine),
  };
}

/**
 * ファイルを読み込んでDocumentを構築
 * 読み込みエラーはそのまま投げる
 */
export async function loadDocument(rootDir: string, documentPath: string): Promise<Document> {
  const source = await fs.readFile(path.join(rootDir, documentPath), 'utf-8');
  return parseDocument(documentPath, source);
}
