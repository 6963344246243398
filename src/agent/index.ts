/**
 * Ask Module
 *
 * Question answering over the hybrid point store, with citations.
 */

export {
  AskPipeline,
  formatAnswerText,
  noAnswerText,
  type AskPipelineOptions,
  type AskRetriever,
} from './ask-pipeline.js';
export {
  MAX_CITATIONS,
  collectCitations,
  formatCitation,
  formatCitations,
  formatCitationsJSON,
  CitationStyleSchema,
  CitationFormatOptionsSchema,
  type CitationStyle,
  type CitationFormatOptions,
  type CitationsOutputJSON,
} from './citations.js';
export {
  AskSettingsSchema,
  type AskSettings,
  type AskAnswer,
  type AskStages,
  type Citation,
} from './types.js';
export {
  createToolRegistry,
  ToolRegistry,
  type ToolDeps,
  type ToolResponse,
  type IndexingDefaults,
} from './tools/index.js';
