/**
 * コードブロックの言語タグ
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import type { DocumentRule, RuleFinding } from './types.js';

// 組み込みの言語リスト（packages/core/data/languages.json）
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const languagesPath = join(__dirname, '..', '..', 'data', 'languages.json');

let builtinLanguages: ReadonlySet<string> | null = null;

/**
 * 組み込みの言語リストを取得（初回のみ読み込む）
 */
export function getBuiltinLanguages(): ReadonlySet<string> {
  if (!builtinLanguages) {
    const data = JSON.parse(readFileSync(languagesPath, 'utf-8')) as { languages: string[] };
    builtinLanguages = new Set(data.languages.map((language) => language.toLowerCase()));
  }
  return builtinLanguages;
}

export const codeLanguageRule: DocumentRule = {
  id: 'code-language',
  title: 'Recognized code block language',
  description: 'フェンスドコードブロックの言語タグが認識できる値である',
  scope: 'document',
  check: (document, context) => {
    const { requireLanguage, extraLanguages } = context.config.codeBlocks;
    const builtin = getBuiltinLanguages();
    const extra = new Set(extraLanguages.map((language) => language.toLowerCase()));

    const findings: RuleFinding[] = [];
    for (const block of document.outline.codeBlocks) {
      if (block.language === null) {
        if (requireLanguage) {
          findings.push({
            path: document.path,
            line: block.line,
            message: 'code block has no language tag',
          });
        }
        continue;
      }

      const language = block.language.toLowerCase();
      if (!builtin.has(language) && !extra.has(language)) {
        findings.push({
          path: document.path,
          line: block.line,
          message: `unrecognized code block language "${block.language}"`,
        });
      }
    }

    return findings;
  },
};
