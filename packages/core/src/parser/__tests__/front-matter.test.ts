import { describe, it, expect } from 'vitest';
import { parseFrontMatter, splitFrontMatter } from '../front-matter.js';

const doc = (...lines: string[]): string => lines.join('\n');

describe('splitFrontMatter', () => {
  it('front-matterと本文を分離できる', () => {
    const block = splitFrontMatter(doc('---', 'title: A', '---', '# Body', 'text'));

    expect(block).toEqual({
      status: 'present',
      yaml: 'title: A',
      body: '# Body\ntext',
      bodyStartLine: 4,
    });
  });

  it('`...`でも閉じられる', () => {
    const block = splitFrontMatter(doc('---', 'title: A', '...', 'Body'));
    expect(block.status).toBe('present');
    expect(block.body).toBe('Body');
  });

  it('BOMとCRLFを正規化する', () => {
    const block = splitFrontMatter('\uFEFF---\r\ntitle: A\r\n---\r\nBody\r\n');

    expect(block).toEqual({
      status: 'present',
      yaml: 'title: A',
      body: 'Body\n',
      bodyStartLine: 4,
    });
  });

  it('閉じられていないブロックは本文として扱う', () => {
    const source = doc('---', 'title: A', 'Body');
    expect(splitFrontMatter(source)).toEqual({ status: 'unclosed', body: source, bodyStartLine: 1 });
  });
});

describe('parseFrontMatter', () => {
  it('認識するフィールドを解析できる', () => {
    const parsed = parseFrontMatter(
      doc(
        '---',
        'title: Inventing the Y-Combinator',
        'tags: [lambda-calculus, recursion, recursion]',
        'date: 2019-03-02',
        'updatedAt: 2020-01-15',
        'series: fundamentals',
        '---',
        'Body'
      )
    );

    expect(parsed.bodyStartLine).toBe(8);
    expect(parsed.body).toBe('Body');
    expect(parsed.frontMatter).toEqual({
      ok: true,
      line: 1,
      data: {
        title: 'Inventing the Y-Combinator',
        tags: ['lambda-calculus', 'recursion'],
        publishedAt: new Date('2019-03-02'),
        editedAt: new Date('2020-01-15'),
        extra: { series: 'fundamentals' },
      },
    });
  });

  it('publishedAtはdateより優先される', () => {
    const parsed = parseFrontMatter(
      doc('---', 'title: T', 'date: 2020-01-01', 'publishedAt: 2021-05-01', '---', '')
    );

    expect(parsed.frontMatter.ok && parsed.frontMatter.data.publishedAt).toEqual(
      new Date('2021-05-01')
    );
  });

  it('tagsは単一の文字列も受け付ける', () => {
    const parsed = parseFrontMatter(doc('---', 'title: T', 'date: 2020-01-01', 'tags: react', '---'));

    expect(parsed.frontMatter.ok && parsed.frontMatter.data.tags).toEqual(['react']);
  });

  it('editedAtがなければ省略される', () => {
    const parsed = parseFrontMatter(doc('---', 'title: T', 'date: 2020-01-01', 'editedAt:', '---'));

    expect(parsed.frontMatter.ok).toBe(true);
    expect(parsed.frontMatter.ok && 'editedAt' in parsed.frontMatter.data).toBe(false);
  });

  it('front-matterがない場合はエラー', () => {
    const parsed = parseFrontMatter('Just prose.');

    expect(parsed.frontMatter).toEqual({
      ok: false,
      issues: [{ message: 'front-matter block is missing', line: 1 }],
    });
    expect(parsed.body).toBe('Just prose.');
    expect(parsed.bodyStartLine).toBe(1);
  });

  it('閉じられていない場合はエラー', () => {
    const parsed = parseFrontMatter(doc('---', 'title: T', ''));

    expect(parsed.frontMatter).toEqual({
      ok: false,
      issues: [{ message: 'front-matter block is not closed', line: 1 }],
    });
  });

  it('YAMLの構文エラーをファイル内の行番号で報告する', () => {
    const parsed = parseFrontMatter(doc('---', 'title: A', 'title: B', 'date: 2020-01-01', '---'));

    expect(parsed.frontMatter.ok).toBe(false);
    if (!parsed.frontMatter.ok) {
      expect(parsed.frontMatter.issues).toHaveLength(1);
      expect(parsed.frontMatter.issues[0].line).toBe(3);
      expect(parsed.frontMatter.issues[0].message).toMatch(/^invalid YAML: /);
    }
  });

  it('マッピングでない場合はエラー', () => {
    const parsed = parseFrontMatter(doc('---', '- a', '- b', '---'));

    expect(parsed.frontMatter).toEqual({
      ok: false,
      issues: [{ message: 'front-matter must be a key-value mapping', line: 1 }],
    });
  });

  it('必須フィールドがない場合はエラー', () => {
    const parsed = parseFrontMatter(doc('---', 'tags: [python]', '---'));

    expect(parsed.frontMatter).toEqual({
      ok: false,
      issues: [
        { message: 'title: Required', line: 1 },
        { message: 'publishedAt: Required', line: 1 },
      ],
    });
  });

  it('空のブロックは必須フィールドのエラーになる', () => {
    const parsed = parseFrontMatter(doc('---', '---', 'Body'));

    expect(parsed.frontMatter.ok).toBe(false);
    expect(parsed.bodyStartLine).toBe(3);
  });

  it('タイムゾーンのない日時はUTCとして解釈する', () => {
    const parsed = parseFrontMatter(
      doc('---', 'title: T', 'date: 2021-01-01 10:00', 'updatedAt: 2021-01-01T09:30:15', '---')
    );

    expect(parsed.frontMatter.ok && parsed.frontMatter.data.publishedAt).toEqual(
      new Date('2021-01-01T10:00:00Z')
    );
    expect(parsed.frontMatter.ok && parsed.frontMatter.data.editedAt).toEqual(
      new Date('2021-01-01T09:30:15Z')
    );
  });

  it('タイムゾーン付きの日時はそのまま解釈する', () => {
    const parsed = parseFrontMatter(doc('---', 'title: T', 'date: 2021-01-01T10:00:00+09:00', '---'));

    expect(parsed.frontMatter.ok && parsed.frontMatter.data.publishedAt).toEqual(
      new Date('2021-01-01T01:00:00Z')
    );
  });

  it('不正な日付をキー名と行番号で報告する', () => {
    const parsed = parseFrontMatter(doc('---', 'title: T', 'date: someday', '---'));

    expect(parsed.frontMatter).toEqual({
      ok: false,
      issues: [{ message: 'date: Invalid date', line: 3 }],
    });
  });

  it('空のタイトルはエラー', () => {
    const parsed = parseFrontMatter(doc('---', 'title: "  "', 'date: 2020-01-01', '---'));

    expect(parsed.frontMatter).toEqual({
      ok: false,
      issues: [{ message: 'title: Must not be empty', line: 2 }],
    });
  });

  it('空のタグはエラー', () => {
    const parsed = parseFrontMatter(doc('---', 'title: T', 'date: 2020-01-01', "tags: [react, ' ']", '---'));

    expect(parsed.frontMatter).toEqual({
      ok: false,
      issues: [{ message: 'tags: Tags must not be empty', line: 4 }],
    });
  });

  it('文字列でないタグはエラー', () => {
    const parsed = parseFrontMatter(doc('---', 'title: T', 'date: 2020-01-01', 'tags: [1, 2]', '---'));

    expect(parsed.frontMatter).toEqual({
      ok: false,
      issues: [{ message: 'tags: Expected a list of strings', line: 4 }],
    });
  });
});
