/**
 * Chunker Module
 *
 * Markdown section chunking and tree-sitter based code chunking.
 */

export { chunkMarkdown, classifyMarkdown, detectDocType, INTRODUCTION_SECTION } from './markdown-chunker.js';
export { parseCode } from './code-parser.js';
export { chunkCode, extractImports, MAX_IMPORTS } from './code-chunker.js';
