/**
 * Code Parser
 *
 * tree-sitter parsing for TypeScript, TSX, JavaScript and Python. Pulls
 * out functions, classes and methods with their name, first-line
 * signature, doc comment and line range.
 */

import Parser from 'tree-sitter';
import TypeScriptLang from 'tree-sitter-typescript';
import JavaScriptLang from 'tree-sitter-javascript';
import PythonLang from 'tree-sitter-python';

import type { CodeElement, CodeElementType, CodeLanguage } from '../types.js';

// tree-sitter's Language type (compiled parser) vs our CodeLanguage (string union)
type TreeSitterLanguage = Parameters<Parser['setLanguage']>[0];

function grammarFor(language: CodeLanguage): TreeSitterLanguage {
  switch (language) {
    case 'typescript':
      return TypeScriptLang.typescript as TreeSitterLanguage;
    case 'tsx':
      return TypeScriptLang.tsx as TreeSitterLanguage;
    case 'javascript':
      return JavaScriptLang as TreeSitterLanguage;
    case 'python':
      return PythonLang as TreeSitterLanguage;
  }
}

const parsers = new Map<CodeLanguage, Parser>();

function parserFor(language: CodeLanguage): Parser {
  let parser = parsers.get(language);
  if (!parser) {
    parser = new Parser();
    parser.setLanguage(grammarFor(language));
    parsers.set(language, parser);
  }
  return parser;
}

const JS_CLASS_TYPES = new Set(['class_declaration', 'abstract_class_declaration', 'class']);
const JS_FUNCTION_TYPES = new Set(['function_declaration', 'generator_function_declaration']);

function firstLine(node: Parser.SyntaxNode): string {
  return (node.text.split('\n')[0] ?? '').trim();
}

function nameOf(node: Parser.SyntaxNode | null | undefined): string {
  return node?.childForFieldName('name')?.text ?? 'anonymous';
}

/**
 * Name of the nearest enclosing class, if any.
 */
function enclosingClass(node: Parser.SyntaxNode, classTypes: Set<string>): string | null {
  for (let parent = node.parent; parent; parent = parent.parent) {
    if (classTypes.has(parent.type)) {
      return nameOf(parent);
    }
  }
  return null;
}

/**
 * JSDoc block right before the node, or before the export wrapping it.
 */
function jsDocComment(node: Parser.SyntaxNode): string | null {
  const anchor = node.parent?.type === 'export_statement' ? node.parent : node;
  const previous = anchor.previousNamedSibling;
  if (previous?.type === 'comment' && previous.text.startsWith('/**')) {
    return previous.text;
  }
  return null;
}

/**
 * A string literal as the first statement of a body.
 */
function pythonDocstring(node: Parser.SyntaxNode): string | null {
  const first = node.childForFieldName('body')?.firstNamedChild;
  if (first?.type === 'expression_statement' && first.firstNamedChild?.type === 'string') {
    return first.firstNamedChild.text;
  }
  return null;
}

function element(
  node: Parser.SyntaxNode,
  type: CodeElementType,
  name: string,
  docComment: string | null,
  classContext: string | null
): CodeElement {
  return {
    type,
    name,
    signature: firstLine(node),
    content: node.text,
    startLine: node.startPosition.row + 1,
    endLine: node.endPosition.row + 1,
    docComment,
    classContext,
  };
}

function extractJs(root: Parser.SyntaxNode): CodeElement[] {
  const elements: CodeElement[] = [];

  for (const node of root.descendantsOfType([...JS_FUNCTION_TYPES])) {
    elements.push(element(node, 'function', nameOf(node), jsDocComment(node), null));
  }

  // const handler = () => {} and const handler = function () {}
  for (const node of root.descendantsOfType('lexical_declaration')) {
    const declarator = node.descendantsOfType('variable_declarator')[0];
    const value = declarator?.childForFieldName('value');
    if (value?.type === 'arrow_function' || value?.type === 'function_expression' || value?.type === 'function') {
      elements.push(element(node, 'function', nameOf(declarator), jsDocComment(node), null));
    }
  }

  for (const node of root.descendantsOfType(['class_declaration', 'abstract_class_declaration'])) {
    elements.push(element(node, 'class', nameOf(node), jsDocComment(node), null));
  }

  for (const node of root.descendantsOfType('method_definition')) {
    elements.push(
      element(node, 'method', nameOf(node), jsDocComment(node), enclosingClass(node, JS_CLASS_TYPES))
    );
  }

  return elements;
}

function extractPython(root: Parser.SyntaxNode): CodeElement[] {
  const elements: CodeElement[] = [];
  const classTypes = new Set(['class_definition']);

  for (const node of root.descendantsOfType('class_definition')) {
    elements.push(element(node, 'class', nameOf(node), pythonDocstring(node), null));
  }

  for (const node of root.descendantsOfType('function_definition')) {
    const classContext = enclosingClass(node, classTypes);
    elements.push(
      element(node, classContext ? 'method' : 'function', nameOf(node), pythonDocstring(node), classContext)
    );
  }

  return elements;
}

/**
 * Parse `content` and return its functions, classes and methods in
 * source order.
 */
export function parseCode(content: string, language: CodeLanguage): CodeElement[] {
  const tree = parserFor(language).parse(content);
  const elements = language === 'python' ? extractPython(tree.rootNode) : extractJs(tree.rootNode);
  return elements.sort((a, b) => a.startLine - b.startLine || a.endLine - b.endLine);
}
