/**
 * check / list / rules コマンドのテスト
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { runCheck } from '../check.js';
import { runList } from '../list.js';
import { runRules } from '../rules.js';

const lines = (...content: string[]): string => content.join('\n');

describe('commands', () => {
  let projectDir: string;
  // 環境変数の設定ファイル指定を無視する
  const env = {};

  beforeAll(async () => {
    projectDir = await fs.realpath(await fs.mkdtemp(path.join(tmpdir(), 'doc-audit-cli-')));
    await fs.mkdir(path.join(projectDir, 'posts'), { recursive: true });
    await fs.mkdir(path.join(projectDir, 'drafts'), { recursive: true });

    await fs.writeFile(
      path.join(projectDir, '.doc-audit.json'),
      JSON.stringify({ rules: { 'math-delimiters': 'off' } })
    );
    await fs.writeFile(
      path.join(projectDir, 'posts', 'y.md'),
      lines(
        '---',
        'title: Inventing the Y-Combinator',
        'date: 2021-03-01',
        'updatedAt: 2020-01-01',
        'tags: [lambda, haskell]',
        '---',
        'Body',
        ''
      )
    );
    await fs.writeFile(
      path.join(projectDir, 'posts', 'lambda.md'),
      lines('---', 'title: Lambda calculus', 'date: 2020-05-01', 'tags: [lambda]', '---', 'Body', '')
    );
    await fs.writeFile(
      path.join(projectDir, 'drafts', 'copy.md'),
      lines('---', 'title: Inventing the Y-Combinator', 'date: 2021-03-02', '---', 'Copy', '')
    );
  });

  afterAll(async () => {
    await fs.rm(projectDir, { recursive: true, force: true });
  });

  describe('check', () => {
    it('エラーがあれば終了コード1', async () => {
      const result = await runCheck([], { cwd: projectDir, env });

      expect(result.report.documentCount).toBe(3);
      expect(result.report.errorCount).toBe(1);
      expect(result.report.warningCount).toBe(2);
      expect(result.exitCode).toBe(1);
    });

    it('問題のない記事は終了コード0', async () => {
      const result = await runCheck(['posts/lambda.md'], { cwd: projectDir, env });

      expect(result.exitCode).toBe(0);
      expect(result.output).toMatch(/^問題なし: 1件の文書（\d+ms）$/);
    });

    it('ディレクトリを指定すると配下の記事を検査する', async () => {
      const result = await runCheck(['posts'], { cwd: projectDir, env });

      expect(result.report.documentCount).toBe(2);
      expect(result.report.diagnostics.map((diagnostic) => diagnostic.ruleId)).toEqual([
        'date-order',
        'duplicate-title',
      ]);
    });

    it('サブディレクトリからの相対パスを解決する', async () => {
      const result = await runCheck(['y.md'], { cwd: path.join(projectDir, 'posts'), env });

      expect(result.report.diagnostics.map((diagnostic) => diagnostic.path)).toEqual([
        'posts/y.md',
        'posts/y.md',
      ]);
    });

    it('警告が--max-warningsを超えると終了コード1', async () => {
      const options = { cwd: projectDir, env };

      expect((await runCheck(['drafts/copy.md'], options)).exitCode).toBe(0);
      expect((await runCheck(['drafts/copy.md'], { ...options, maxWarnings: '1' })).exitCode).toBe(0);
      expect((await runCheck(['drafts/copy.md'], { ...options, maxWarnings: '0' })).exitCode).toBe(1);
    });

    it('--quietでは警告を出力しない', async () => {
      const result = await runCheck([], { cwd: projectDir, env, quiet: true, format: 'json' });
      const output = JSON.parse(result.output);

      expect(output.diagnostics).toHaveLength(1);
      expect(output.diagnostics[0].ruleId).toBe('date-order');
      expect(output.warningCount).toBe(0);
      expect(result.exitCode).toBe(1);
    });

    it('プロジェクト外のパスや不正なオプションはエラー', async () => {
      await expect(runCheck(['../elsewhere.md'], { cwd: projectDir, env })).rejects.toThrow(
        'Path is outside the project root: ../elsewhere.md'
      );
      await expect(runCheck([], { cwd: projectDir, env, maxWarnings: 'many' })).rejects.toThrow(
        '--max-warnings must be a non-negative integer: many'
      );
    });
  });

  describe('list', () => {
    it('公開日の新しい順に出力する', async () => {
      const output = JSON.parse(await runList({ cwd: projectDir, env, format: 'json' }));

      expect(output.map((entry: { path: string }) => entry.path)).toEqual([
        'drafts/copy.md',
        'posts/y.md',
        'posts/lambda.md',
      ]);
    });

    it('タグで絞り込める', async () => {
      const output = await runList({ cwd: projectDir, env, tag: 'lambda' });

      expect(output).toBe(
        lines(
          '記事: 2件',
          '',
          '2021-03-01  Inventing the Y-Combinator (更新: 2020-01-01)',
          '  posts/y.md  [lambda, haskell]',
          '2020-05-01  Lambda calculus',
          '  posts/lambda.md  [lambda]'
        )
      );
    });
  });

  describe('rules', () => {
    it('設定ファイルの値を反映する', async () => {
      const output: Array<{ id: string; setting: string }> = JSON.parse(
        await runRules({ cwd: projectDir, env, format: 'json' })
      );

      expect(output).toHaveLength(8);
      expect(output.find((rule) => rule.id === 'math-delimiters')?.setting).toBe('off');
      expect(output.find((rule) => rule.id === 'duplicate-title')?.setting).toBe('warn');
    });
  });
});
