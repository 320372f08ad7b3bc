export * from './types.js';
export * from './references.js';
export * from './registry.js';
export { frontMatterRule, dateOrderRule } from './front-matter.js';
export { codeLanguageRule, getBuiltinLanguages } from './code-language.js';
export { imageExistsRule } from './image-exists.js';
export { brokenLinkRule } from './broken-link.js';
export { footnotesRule } from './footnotes.js';
export { mathDelimitersRule } from './math-delimiters.js';
export { duplicateTitleRule, normalizeTitle } from './duplicate-title.js';
