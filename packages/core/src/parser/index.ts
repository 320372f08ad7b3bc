/**
 * Parser exports
 */

export { splitFrontMatter, parseFrontMatter, type FrontMatterBlock, type ParsedSource } from './front-matter.js';
export { MarkdownParser, fenceLanguage } from './markdown-parser.js';
export { parseDocument, loadDocument } from './document-loader.js';
