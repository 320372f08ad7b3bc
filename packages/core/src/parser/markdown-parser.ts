import { marked, type Token, type Tokens } from 'marked';
import type { DocumentOutline } from '@doc-audit/types';

const INLINE_CODE = /(`+)[^`]*?\1/g;
const FOOTNOTE_DEFINITION = /^ {0,3}\[\^([^\]\s]+)\]:/;
const FOOTNOTE_REFERENCE = /\[\^([^\]\s]+)\]/g;
const MATH_DELIMITER = '$$';
const HTML_IMAGE = /<img\b[^>]*?\bsrc\s*=\s*["']([^"']+)["']/gi;

function isCode(token: Token): token is Tokens.Code {
  return token.type === 'code';
}

function isHeading(token: Token): token is Tokens.Heading {
  return token.type === 'heading';
}

function isImage(token: Token): token is Tokens.Image {
  return token.type === 'image';
}

function isLink(token: Token): token is Tokens.Link {
  return token.type === 'link';
}

function isHtml(token: Token): token is Tokens.HTML {
  return token.type === 'html';
}

/** 行頭のブロック引用・リストマーカーとインデント */
const CONTAINER_PREFIX = /^(?:\s*(?:>|[-*+]\s|\d{1,9}[.)]\s))*\s*/;

/** コードブロックが占めるファイル内行番号の範囲（両端を含む） */
interface LineRange {
  start: number;
  end: number;
}

function countNewlines(text: string): number {
  return text.split('\n').length - 1;
}

function stripContainer(line: string): string {
  return line.replace(CONTAINER_PREFIX, '').trimEnd();
}

/**
 * info stringから言語名を取り出す（```js title="x" や ```js{1,3} の先頭部分）
 */
export function fenceLanguage(info: string | undefined): string | null {
  const match = /^[^\s{]+/.exec(info?.trim() ?? '');
  return match ? match[0] : null;
}

/**
 * Markdown本文の構造情報を抽出するクラス
 * 行番号はトップレベルトークンのrawを本文中で検索して求める（ファイル内行番号、1-indexed）
 * 単独の参照定義（[ref]: url）はrawごと捨てられるため、rawの長さの積算では行がずれる
 */
export class MarkdownParser {
  /**
   * @param body front-matterを除いた本文
   * @param bodyStartLine 本文1行目のファイル内行番号
   */
  parse(body: string, bodyStartLine: number = 1): DocumentOutline {
    const outline: DocumentOutline = {
      codeBlocks: [],
      images: [],
      links: [],
      footnoteReferences: [],
      footnoteDefinitions: [],
      unclosedMath: [],
      headings: [],
    };
    const offset = bodyStartLine - 1;
    const codeRanges: LineRange[] = [];

    // markedと同じく行頭のタブを空白に展開してから検索する（行数は変わらない）
    const source = body
      .replace(/\r\n?/g, '\n')
      .replace(/^( *)(\t+)/gm, (_match, leading: string, tabs: string) => leading + '    '.repeat(tabs.length));

    const tokens = marked.lexer(source);
    let cursor = 0;
    let currentLine = 1;

    for (const token of tokens) {
      const index = source.indexOf(token.raw, cursor);
      if (index !== -1) {
        currentLine += countNewlines(source.slice(cursor, index));
        this.collectTokens(token, currentLine + offset, outline, codeRanges);
        currentLine += countNewlines(token.raw);
        cursor = index + token.raw.length;
      } else {
        this.collectTokens(token, currentLine + offset, outline, codeRanges);
      }
    }

    this.scanLines(source, offset, outline, codeRanges);

    return outline;
  }

  /**
   * トップレベルトークンとその子孫から参照を収集
   */
  private collectTokens(
    block: Token,
    blockLine: number,
    outline: DocumentOutline,
    codeRanges: LineRange[]
  ): void {
    // 同じrawが複数回現れる場合に備えて、検索開始位置をraw毎に記録
    const searchFrom = new Map<string, number>();
    const locate = (raw: string): number => {
      const index = block.raw.indexOf(raw, searchFrom.get(raw) ?? 0);
      if (index === -1) {
        return blockLine;
      }
      searchFrom.set(raw, index + 1);
      return blockLine + countNewlines(block.raw.slice(0, index));
    };

    // リストや引用の中のコードはインデントやマーカーが除かれているため、先頭行で照合する
    const blockLines = block.raw.split('\n').map(stripContainer);
    let codeLineCursor = 0;
    const locateCode = (raw: string): number => {
      const firstLine = stripContainer(raw.split('\n')[0]);
      for (let i = codeLineCursor; i < blockLines.length; i++) {
        if (blockLines[i] === firstLine) {
          codeLineCursor = i + 1;
          return blockLine + i;
        }
      }
      return blockLine;
    };

    if (isHeading(block)) {
      outline.headings.push({ depth: block.depth, text: block.text, line: blockLine });
    }

    marked.walkTokens([block], (token) => {
      if (isCode(token)) {
        const line = locateCode(token.raw);
        codeRanges.push({ start: line, end: line + countNewlines(token.raw.replace(/\n+$/, '')) });
        if (token.codeBlockStyle !== 'indented') {
          outline.codeBlocks.push({ language: fenceLanguage(token.lang), line });
        }
      } else if (isImage(token)) {
        outline.images.push({ src: token.href, line: locate(token.raw) });
      } else if (isLink(token)) {
        // 定義済みの脚注 [^x] は参照リンクとして解釈されるため除外
        if (token.raw.startsWith('[^')) {
          return;
        }
        outline.links.push({ href: token.href, line: locate(token.raw) });
      } else if (isHtml(token)) {
        const line = locate(token.raw);
        for (const match of token.raw.matchAll(HTML_IMAGE)) {
          outline.images.push({
            src: match[1],
            line: line + countNewlines(token.raw.slice(0, match.index)),
          });
        }
      }
    });
  }

  /**
   * 脚注と数式ブロックを行単位で走査
   * コードブロック（ネストしたものやインデントによるものを含む）とインラインコードの中身は対象外
   */
  private scanLines(body: string, offset: number, outline: DocumentOutline, codeRanges: LineRange[]): void {
    let mathOpenedAt: number | null = null;

    const lines = body.split('\n');

    for (let index = 0; index < lines.length; index++) {
      const lineNumber = index + 1 + offset;
      if (codeRanges.some((range) => lineNumber >= range.start && lineNumber <= range.end)) {
        continue;
      }

      let text = lines[index].replace(INLINE_CODE, '');

      const definition = FOOTNOTE_DEFINITION.exec(text);
      if (definition) {
        outline.footnoteDefinitions.push({ label: definition[1], line: lineNumber });
        text = text.slice(definition[0].length);
      }

      for (const match of text.matchAll(FOOTNOTE_REFERENCE)) {
        outline.footnoteReferences.push({ label: match[1], line: lineNumber });
      }

      const delimiters = text.split(MATH_DELIMITER).length - 1;
      for (let i = 0; i < delimiters; i++) {
        mathOpenedAt = mathOpenedAt === null ? lineNumber : null;
      }
    }

    if (mathOpenedAt !== null) {
      outline.unclosedMath.push(mathOpenedAt);
    }
  }
}
