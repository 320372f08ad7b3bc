import { brokenLinkRule } from './broken-link.js';
import { codeLanguageRule } from './code-language.js';
import { duplicateTitleRule } from './duplicate-title.js';
import { footnotesRule } from './footnotes.js';
import { dateOrderRule, frontMatterRule } from './front-matter.js';
import { imageExistsRule } from './image-exists.js';
import { mathDelimitersRule } from './math-delimiters.js';
import type { RuleDefinition } from './types.js';

export const ALL_RULES: RuleDefinition[] = [
  frontMatterRule,
  dateOrderRule,
  codeLanguageRule,
  imageExistsRule,
  brokenLinkRule,
  footnotesRule,
  mathDelimitersRule,
  duplicateTitleRule,
];

