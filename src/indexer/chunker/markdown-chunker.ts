/**
 * Markdown Chunker
 *
 * Splits a markdown file into section-scoped chunks:
 *
 * - every line starting with `## ` opens a new section (and a new chunk);
 *   text before the first one belongs to "Introduction"
 * - a chunk closes before the line that would take it past `chunkSize`
 *   characters, or twice that while it holds a numbered list or a table,
 *   so lists and tables stay whole where they can
 * - trailing lines of a closed chunk, at most `overlap` characters in
 *   total, are repeated at the start of the next one
 *
 * Content type comes from the marked lexer: an ordered list makes a
 * `list` chunk (with `list_length`), then `table`, then fenced `code`,
 * else `text`.
 */

import { marked, type Token, type Tokens } from 'marked';
import type { ChunkInput, ContentType } from '../../store/types.js';
import { normalizePath } from '../../utils/path.js';
import type { ChunkingOptions } from '../types.js';

export const INTRODUCTION_SECTION = 'Introduction';

const SECTION_PREFIX = '## ';
const NUMBERED_LINE = /^\s*\d+\.\s/;

/**
 * Path fragments that decide `doc_type`, checked in order.
 */
const DOC_TYPE_RULES: Array<{ docType: string; pattern: RegExp }> = [
  { docType: 'policy', pattern: /\bpolic(y|ies)\b/i },
  { docType: 'sdlc', pattern: /\bsdlc\b|development-life-cycle/i },
  { docType: 'flow', pattern: /\bflows?\b/i },
  { docType: 'infrastructure', pattern: /\binfra(structure)?\b/i },
  { docType: 'decision', pattern: /\b(decisions?|adr|discussions?)\b/i },
];

export function detectDocType(filePath: string): string {
  const path = normalizePath(filePath);
  return DOC_TYPE_RULES.find((rule) => rule.pattern.test(path))?.docType ?? 'other';
}

function isOrderedList(token: Token): token is Tokens.List {
  return token.type === 'list' && token.ordered === true;
}

interface Classification {
  contentType: ContentType;
  listLength: number | null;
}

/**
 * Classify chunk text by its block tokens.
 */
export function classifyMarkdown(content: string): Classification {
  const tokens = marked.lexer(content);

  const list = tokens.find(isOrderedList);
  if (list) {
    return { contentType: 'list', listLength: list.items.length };
  }
  if (tokens.some((token) => token.type === 'table')) {
    return { contentType: 'table', listLength: null };
  }
  if (tokens.some((token) => token.type === 'code')) {
    return { contentType: 'code', listLength: null };
  }
  return { contentType: 'text', listLength: null };
}

function isStructuredLine(line: string): boolean {
  return NUMBERED_LINE.test(line) || line.includes('|');
}

/**
 * Trailing lines totalling at most `overlap` characters (newlines
 * included), never all of `lines`.
 */
function overlapTail(lines: string[], overlap: number): string[] {
  let total = 0;
  let count = 0;
  for (let i = lines.length - 1; i > 0; i--) {
    total += (lines[i] ?? '').length + 1;
    if (total > overlap) break;
    count++;
  }
  return count > 0 ? lines.slice(-count) : [];
}

export function chunkMarkdown(
  content: string,
  filePath: string,
  options: ChunkingOptions
): ChunkInput[] {
  const { chunkSize, overlap } = options;
  const path = normalizePath(filePath);
  const docType = detectDocType(path);
  const lines = content.split('\n');
  const chunks: ChunkInput[] = [];

  const emit = (chunkLines: string[], lineStart: number, lineEnd: number, section: string) => {
    const text = chunkLines.join('\n');
    if (text.trim().length === 0) {
      return;
    }
    const { contentType, listLength } = classifyMarkdown(text);
    chunks.push({
      content: text,
      filePath: path,
      lineStart,
      lineEnd,
      section,
      contentType,
      category: 'doc',
      docType,
      metadata: {
        list_length: listLength,
        is_complete: contentType !== 'text',
      },
    });
  };

  let section = INTRODUCTION_SECTION;
  let current: string[] = [];
  let start = 1;
  let structured = false;

  lines.forEach((line, index) => {
    const lineNumber = index + 1;

    if (line.startsWith(SECTION_PREFIX)) {
      emit(current, start, lineNumber - 1, section);
      section = line.slice(SECTION_PREFIX.length).trim();
      current = [line];
      start = lineNumber;
      structured = false;
      return;
    }

    current.push(line);
    structured = structured || isStructuredLine(line);
    const limit = structured ? chunkSize * 2 : chunkSize;
    if (current.length === 1 || current.join('\n').length <= limit) {
      return;
    }

    const previous = current.slice(0, -1);
    emit(previous, start, lineNumber - 1, section);
    const tail = overlapTail(previous, overlap);
    current = [...tail, line];
    start = lineNumber - tail.length;
    structured = current.some(isStructuredLine);
  });

  emit(current, start, lines.length, section);
  return chunks;
}
