/**
 * 文書データの型定義
 */

export interface Document {
  /** 文書のパス（プロジェクトルートからの相対パス、区切りは'/'） */
  path: string;
  /** front-matterの解析結果 */
  frontMatter: FrontMatterResult;
  /** front-matterを除いた本文 */
  body: string;
  /** 本文1行目のファイル内行番号（1-indexed） */
  bodyStartLine: number;
  /** 本文の構造情報 */
  outline: DocumentOutline;
}

export interface FrontMatter {
  /** タイトル */
  title: string;
  /** タグ（重複なし、出現順） */
  tags: string[];
  /** 公開日（date / publishedAt） */
  publishedAt: Date;
  /** 編集日（updatedAt / editedAt） */
  editedAt?: Date;
  /** 認識しないフィールド */
  extra: Record<string, unknown>;
}

export interface FrontMatterIssue {
  message: string;
  /** ファイル内行番号（1-indexed） */
  line: number;
}

export type FrontMatterResult =
  | { ok: true; data: FrontMatter; line: number }
  | { ok: false; issues: FrontMatterIssue[] };

export interface CodeBlockRef {
  /** 宣言された言語（info stringの先頭語）。未指定ならnull */
  language: string | null;
  line: number;
}

export interface ImageRef {
  src: string;
  line: number;
}

export interface LinkRef {
  href: string;
  line: number;
}

export interface FootnoteRef {
  label: string;
  line: number;
}

export interface HeadingRef {
  depth: number;
  text: string;
  line: number;
}

export interface DocumentOutline {
  codeBlocks: CodeBlockRef[];
  images: ImageRef[];
  links: LinkRef[];
  footnoteReferences: FootnoteRef[];
  footnoteDefinitions: FootnoteRef[];
  /** 閉じられていない `$$` の開始行 */
  unclosedMath: number[];
  headings: HeadingRef[];
}

/** 文書一覧の1エントリ */
export interface CatalogEntry {
  path: string;
  title: string;
  tags: string[];
  publishedAt: Date;
  editedAt?: Date;
}
