/**
 * front-matterの分離と解析
 *
 * 1行目が `---` の場合、次の `---`（または `...`）行までをYAMLとして扱う。
 * 認識するフィールド:
 * - title（必須）
 * - tags（文字列または文字列のリスト）
 * - publishedAt / date（必須）
 * - editedAt / updatedAt / lastmod
 * 同じ意味のキーが両方ある場合は左側（publishedAt, editedAt）を優先する。
 */

import { parse as parseYaml, YAMLParseError } from 'yaml';
import { z } from 'zod';
import type { FrontMatter, FrontMatterIssue, FrontMatterResult } from '@doc-audit/types';

export type FrontMatterBlock =
  | { status: 'present'; yaml: string; body: string; bodyStartLine: number }
  | { status: 'missing'; body: string; bodyStartLine: number }
  | { status: 'unclosed'; body: string; bodyStartLine: number };

export interface ParsedSource {
  frontMatter: FrontMatterResult;
  body: string;
  bodyStartLine: number;
}

const OPEN_FENCE = '---';
const CLOSE_FENCES = new Set(['---', '...']);

/** エイリアス（優先順） */
const PUBLISHED_KEYS = ['publishedAt', 'date'] as const;
const EDITED_KEYS = ['editedAt', 'updatedAt', 'lastmod'] as const;
const RECOGNIZED_KEYS = new Set<string>(['title', 'tags', ...PUBLISHED_KEYS, ...EDITED_KEYS]);

/** タイムゾーン指定のない日時（YYYY-MM-DD hh:mm[:ss]） */
const ZONELESS_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

/**
 * タイムゾーン指定のない日時はUTCとして扱う
 * （日付のみの値はDateがUTCとして解釈するため、それに揃える）
 */
function zonelessToUtc(value: string | Date): string | Date {
  if (typeof value !== 'string') {
    return value;
  }
  const match = ZONELESS_DATE_TIME.exec(value.trim());
  return match ? `${match[1]}T${match[2]}Z` : value;
}

const dateSchema = z
  .union([z.string(), z.date()], {
    errorMap: (_issue, ctx) => ({ message: ctx.data === undefined ? 'Required' : 'Expected a date' }),
  })
  .transform(zonelessToUtc)
  .pipe(z.coerce.date());

/** タグは文字列1つまたはリスト。トリムして重複を除く（出現順を維持） */
const tagsSchema = z
  .union([z.string(), z.array(z.string())], {
    errorMap: () => ({ message: 'Expected a list of strings' }),
  })
  .transform((tags) => (typeof tags === 'string' ? [tags] : tags))
  .pipe(z.array(z.string().trim().min(1, 'Tags must not be empty')))
  .transform((tags) => [...new Set(tags)]);

const frontMatterSchema = z.object({
  title: z
    .string({ required_error: 'Required', invalid_type_error: 'Expected a string' })
    .trim()
    .min(1, 'Must not be empty'),
  tags: tagsSchema.default([]),
  publishedAt: dateSchema,
  editedAt: dateSchema.optional(),
});

type FrontMatterField = keyof z.infer<typeof frontMatterSchema>;

/**
 * ソースをfront-matterブロックと本文に分離
 * BOMを除去し、改行コードをLFに揃える
 */
export function splitFrontMatter(source: string): FrontMatterBlock {
  const text = source.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
  const lines = text.split('\n');

  if (lines[0].trimEnd() !== OPEN_FENCE) {
    return { status: 'missing', body: text, bodyStartLine: 1 };
  }

  for (let i = 1; i < lines.length; i++) {
    if (CLOSE_FENCES.has(lines[i].trimEnd())) {
      return {
        status: 'present',
        yaml: lines.slice(1, i).join('\n'),
        body: lines.slice(i + 1).join('\n'),
        bodyStartLine: i + 2,
      };
    }
  }

  // 閉じられていないブロックは本文として扱う
  return { status: 'unclosed', body: text, bodyStartLine: 1 };
}

/**
 * ソース全体を解析してfront-matterと本文を得る
 */
export function parseFrontMatter(source: string): ParsedSource {
  const block = splitFrontMatter(source);
  const { body, bodyStartLine } = block;

  if (block.status === 'missing') {
    return {
      frontMatter: fail([{ message: 'front-matter block is missing', line: 1 }]),
      body,
      bodyStartLine,
    };
  }

  if (block.status === 'unclosed') {
    return {
      frontMatter: fail([{ message: 'front-matter block is not closed', line: 1 }]),
      body,
      bodyStartLine,
    };
  }

  return { frontMatter: parseYamlBlock(block.yaml), body, bodyStartLine };
}

/**
 * YAMLブロックを解析・検証
 * YAMLの1行目はファイルの2行目にあたる
 */
function parseYamlBlock(yaml: string): FrontMatterResult {
  let value: unknown;
  try {
    value = parseYaml(yaml);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      const yamlLine = error.linePos?.[0].line ?? 1;
      const [summary] = error.message.split('\n');
      return fail([{ message: `invalid YAML: ${summary}`, line: yamlLine + 1 }]);
    }
    throw error;
  }

  // 空のブロックは空のマッピングとして扱う
  const raw = value ?? {};
  if (!isRecord(raw)) {
    return fail([{ message: 'front-matter must be a key-value mapping', line: 1 }]);
  }

  const yamlLines = yaml.split('\n');
  const lineOf = (key: string): number => {
    const index = yamlLines.findIndex((line) => line.startsWith(`${key}:`));
    return index === -1 ? 1 : index + 2;
  };

  const publishedKey = pickKey(raw, PUBLISHED_KEYS);
  const editedKey = pickKey(raw, EDITED_KEYS);
  const sourceKeys: Record<FrontMatterField, string> = {
    title: 'title',
    tags: 'tags',
    publishedAt: publishedKey ?? 'publishedAt',
    editedAt: editedKey ?? 'editedAt',
  };

  const parsed = frontMatterSchema.safeParse({
    title: present(raw.title),
    tags: present(raw.tags),
    publishedAt: publishedKey ? present(raw[publishedKey]) : undefined,
    editedAt: editedKey ? present(raw[editedKey]) : undefined,
  });

  if (!parsed.success) {
    return fail(
      parsed.error.issues.map((issue) => {
        const field = String(issue.path[0]);
        const key = isField(field) ? sourceKeys[field] : field;
        return { message: `${key}: ${issue.message}`, line: lineOf(key) };
      })
    );
  }

  const { title, tags, publishedAt, editedAt } = parsed.data;

  const extra: Record<string, unknown> = {};
  for (const [key, fieldValue] of Object.entries(raw)) {
    if (!RECOGNIZED_KEYS.has(key)) {
      extra[key] = fieldValue;
    }
  }

  const data: FrontMatter = { title, tags, publishedAt, extra };
  if (editedAt !== undefined) {
    data.editedAt = editedAt;
  }

  return { ok: true, data, line: 1 };
}

function fail(issues: FrontMatterIssue[]): FrontMatterResult {
  return { ok: false, issues };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function isField(key: string): key is FrontMatterField {
  return key === 'title' || key === 'tags' || key === 'publishedAt' || key === 'editedAt';
}

/**
 * YAMLのnull（値なし）は未指定とみなす
 */
function present(value: unknown): unknown {
  return value === null ? undefined : value;
}

function pickKey<K extends string>(raw: Record<string, unknown>, keys: readonly K[]): K | undefined {
  return keys.find((key) => present(raw[key]) !== undefined);
}
