import { describe, it, expect, beforeEach } from 'vitest';
import { MarkdownParser, fenceLanguage } from '../markdown-parser.js';

describe('MarkdownParser', () => {
  let parser: MarkdownParser;

  beforeEach(() => {
    parser = new MarkdownParser();
  });

  describe('ブロック要素', () => {
    it('見出し・画像・リンク・コードブロックをファイル内行番号で抽出できる', () => {
      const body = [
        '# Fixed points',
        '',
        'See ![diagram](./img/y.png) and [prior](../lambda.md).',
        '',
        '```python title="tidy.py"',
        'with tidy():',
        '```',
        '',
        '```',
        'plain',
        '```',
      ].join('\n');

      const outline = parser.parse(body, 5);

      expect(outline.headings).toEqual([{ depth: 1, text: 'Fixed points', line: 5 }]);
      expect(outline.images).toEqual([{ src: './img/y.png', line: 7 }]);
      expect(outline.links).toEqual([{ href: '../lambda.md', line: 7 }]);
      expect(outline.codeBlocks).toEqual([
        { language: 'python', line: 9 },
        { language: null, line: 13 },
      ]);
    });

    it('インデントされたコードブロックは収集しない', () => {
      const body = ['Paragraph.', '', '    const x = 1;'].join('\n');

      expect(parser.parse(body).codeBlocks).toEqual([]);
    });

    it('リスト内の画像を行ごとに抽出できる', () => {
      const body = ['- first ![a](a.png)', '- second ![b](b.png)'].join('\n');

      expect(parser.parse(body).images).toEqual([
        { src: 'a.png', line: 1 },
        { src: 'b.png', line: 2 },
      ]);
    });

    it('ブロック間の参照定義があっても行番号がずれない', () => {
      const body = ['# T', '', '[ref]: ./a.md', '', '```js', 'x', '```', '', '[r][ref]'].join('\n');

      const outline = parser.parse(body);

      expect(outline.codeBlocks).toEqual([{ language: 'js', line: 5 }]);
      expect(outline.links).toEqual([{ href: './a.md', line: 9 }]);
    });

    it('ブロック間の脚注定義があっても行番号がずれない', () => {
      const body = ['Text[^n].', '', '[^n]: note', '', '![y](./y.png)', '', '```sh', 'ls', '```'].join(
        '\n'
      );

      const outline = parser.parse(body, 3);

      expect(outline.images).toEqual([{ src: './y.png', line: 7 }]);
      expect(outline.codeBlocks).toEqual([{ language: 'sh', line: 9 }]);
    });

    it('行頭のタブがあっても行番号がずれない', () => {
      const body = ['\tindented with a tab', '', '```js', 'x', '```'].join('\n');

      expect(parser.parse(body).codeBlocks).toEqual([{ language: 'js', line: 3 }]);
    });

    it('リスト内のコードブロックを実際の行で報告する', () => {
      const body = ['- item', '', '    ```sh', '    echo $$', '    ```'].join('\n');

      const outline = parser.parse(body);

      expect(outline.codeBlocks).toEqual([{ language: 'sh', line: 3 }]);
      expect(outline.unclosedMath).toEqual([]);
    });

    it('引用内のコードブロックを実際の行で報告する', () => {
      const body = ['> quote', '>', '> ```js', '> const pid = $$;', '> ```'].join('\n');

      const outline = parser.parse(body);

      expect(outline.codeBlocks).toEqual([{ language: 'js', line: 3 }]);
      expect(outline.unclosedMath).toEqual([]);
    });

    it('HTMLのimgタグを抽出できる', () => {
      const body = ['<p align="center">', '  <img src="/images/taxonomy.svg" width="400">', '</p>'].join(
        '\n'
      );

      expect(parser.parse(body).images).toEqual([{ src: '/images/taxonomy.svg', line: 2 }]);
    });
  });

  describe('脚注と数式', () => {
    const body = [
      'Recursion without names[^y] is possible[^z].',
      '',
      '`[^code]` is not a reference.',
      '',
      '```',
      '[^fenced]',
      '```',
      '',
      '$$',
      'Y = \\lambda f.(\\lambda x.f(x x))(\\lambda x.f(x x))',
      '$$',
      '',
      '[^y]: Curry, 1940s.',
      '',
      'Inline $$a$$ then an open $$',
    ].join('\n');

    it('脚注の参照と定義を抽出できる', () => {
      const outline = parser.parse(body);

      expect(outline.footnoteReferences).toEqual([
        { label: 'y', line: 1 },
        { label: 'z', line: 1 },
      ]);
      expect(outline.footnoteDefinitions).toEqual([{ label: 'y', line: 13 }]);
    });

    it('定義済みの脚注参照をリンクとして扱わない', () => {
      const outline = parser.parse(['See[^y].', '', '[^y]: note.md'].join('\n'));

      expect(outline.links).toEqual([]);
      expect(outline.footnoteReferences).toEqual([{ label: 'y', line: 1 }]);
    });

    it('閉じられていない$$の開始行を記録する', () => {
      expect(parser.parse(body).unclosedMath).toEqual([15]);
    });

    it('インデントされたコードブロック内の脚注と$$は対象外', () => {
      const outline = parser.parse(['Paragraph.', '', '    echo $$ [^x]', '', 'Done.'].join('\n'));

      expect(outline.footnoteReferences).toEqual([]);
      expect(outline.unclosedMath).toEqual([]);
    });

    it('リスト内のコードブロックの脚注は対象外', () => {
      const outline = parser.parse(['1. step', '', '   ```', '   [^x]', '   ```'].join('\n'));

      expect(outline.footnoteReferences).toEqual([]);
    });

    it('閉じられた数式ブロックは記録しない', () => {
      expect(parser.parse(['$$', 'x^2', '$$'].join('\n')).unclosedMath).toEqual([]);
    });
  });
});

describe('fenceLanguage', () => {
  it('info stringの先頭語を返す', () => {
    expect(fenceLanguage('jsx')).toBe('jsx');
    expect(fenceLanguage('  sh  ')).toBe('sh');
    expect(fenceLanguage('js{1,3}')).toBe('js');
  });

  it('未指定ならnullを返す', () => {
    expect(fenceLanguage('')).toBeNull();
    expect(fenceLanguage(undefined)).toBeNull();
  });
});
