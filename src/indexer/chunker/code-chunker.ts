/**
 * Code Chunker
 *
 * One chunk per parsed element. Each chunk carries the file's imports (up
 * to 10) and the element's doc comment ahead of its code, so a chunk reads
 * on its own. A file without parsable elements becomes a single `module`
 * chunk.
 */

import { basename } from 'node:path';
import type { ChunkInput } from '../../store/types.js';
import { normalizePath } from '../../utils/path.js';
import type { CodeElement, CodeLanguage } from '../types.js';

export const MAX_IMPORTS = 10;

function commentPrefix(language: CodeLanguage): string {
  return language === 'python' ? '#' : '//';
}

function isImportLine(line: string, language: CodeLanguage): boolean {
  if (language === 'python') {
    return line.startsWith('import ') || line.startsWith('from ');
  }
  return line.startsWith('import ') || /\brequire\(/.test(line);
}

export function extractImports(content: string, language: CodeLanguage): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => isImportLine(line, language))
    .slice(0, MAX_IMPORTS);
}

function chunkContent(code: string, docComment: string | null, imports: string[], language: CodeLanguage): string {
  const prefix = commentPrefix(language);
  const parts: string[] = [];
  if (imports.length > 0) {
    parts.push(`${prefix} Imports:\n${imports.join('\n')}`, '');
  }
  // JS doc comments sit outside the node; Python docstrings are already in the code
  if (docComment && !code.includes(docComment)) {
    parts.push(`${prefix} Documentation:\n${docComment}`, '');
  }
  parts.push(code);
  return parts.join('\n');
}

export function chunkCode(
  elements: CodeElement[],
  content: string,
  language: CodeLanguage,
  filePath: string
): ChunkInput[] {
  const path = normalizePath(filePath);
  const imports = extractImports(content, language);
  const base = {
    filePath: path,
    contentType: 'code' as const,
    category: 'code' as const,
    language,
  };

  if (elements.length === 0) {
    const name = basename(path);
    return [
      {
        ...base,
        content,
        lineStart: 1,
        lineEnd: content.split('\n').length,
        section: name,
        codeType: 'module',
        metadata: { name, imports, class_context: null, signature: '' },
      },
    ];
  }

  return elements.map((element) => ({
    ...base,
    content: chunkContent(element.content, element.docComment, imports, language),
    lineStart: element.startLine,
    lineEnd: element.endLine,
    section: element.classContext ?? element.name,
    codeType: element.type,
    metadata: {
      name: element.name,
      imports,
      class_context: element.classContext,
      signature: element.signature,
    },
  }));
}
