/**
 * Query Analyzer
 *
 * Single-pass intent classifier. Pattern groups are tested in fixed
 * precedence and the first group with a match wins:
 *
 *   enumeration > code_search > comparison > explanation > factual
 *
 * Confidence is the group's base plus 0.05 per distinct matching pattern,
 * capped at 1. Factual is the fallback at 0.5.
 *
 * @example
 * ```typescript
 * analyzeQuery('list all payment flows');
 * // { intent: 'enumeration', confidence: 0.95, keywords: ['list all'], ... }
 * ```
 */

import { ValidationError } from '../errors/index.js';
import type { ContentCategory } from '../store/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { QueryAnalysis, QueryIntent } from './types.js';

interface IntentRule {
  intent: QueryIntent;
  base: number;
  patterns: RegExp[];
  contentTypes: ContentCategory[];
  needsExpansion: boolean;
  needsReranking: boolean;
}

const RULES: IntentRule[] = [
  {
    intent: 'enumeration',
    base: 0.9,
    patterns: [
      /\blist\s+all\b/i,
      /\bhow\s+many\b/i,
      /\bwhat\s+are\s+all\b/i,
      /\benumerate\b/i,
      /\bshow\s+me\s+all\b/i,
      /\bcomplete\s+list\b/i,
      /\ball\s+of\s+the\b/i,
      /\bgive\s+me\s+all\b/i,
    ],
    contentTypes: ['doc'],
    needsExpansion: true,
    needsReranking: true,
  },
  {
    intent: 'code_search',
    base: 0.9,
    patterns: [
      /\bshow\s+me.*code\b/i,
      /\bfind.*function\b/i,
      /\bwhere\s+is.*implementation\b/i,
      /\bcode\s+for\b/i,
      /\bfind.*method\b/i,
      /\bimplementation\s+of\b/i,
      /\bhow\s+.*is.*implemented\b/i,
      /\bclass.*definition\b/i,
      /\bfunction.*signature\b/i,
    ],
    contentTypes: ['code', 'doc'],
    needsExpansion: false,
    needsReranking: true,
  },
  {
    intent: 'comparison',
    base: 0.85,
    patterns: [
      /\bdifference\s+between\b/i,
      /\bcompare\b/i,
      /\bvs\.\b/i,
      /\bversus\b/i,
      /\bvs\b/i,
      /\bwhat\s+is\s+different\b/i,
      /\bsimilarities\s+and\s+differences\b/i,
    ],
    contentTypes: ['doc', 'code'],
    needsExpansion: true,
    needsReranking: true,
  },
  {
    intent: 'explanation',
    base: 0.8,
    patterns: [
      /\bwhat\s+is\b/i,
      /\bexplain\b/i,
      /\bhow\s+does\b/i,
      /\bwhy\b/i,
      /\bdescribe\b/i,
      /\bwhat\s+does\b/i,
      /\btell\s+me\s+about\b/i,
      /\bwhat\s+are\s+the\b/i,
    ],
    contentTypes: ['doc'],
    needsExpansion: true,
    needsReranking: true,
  },
];

const FACTUAL_CONFIDENCE = 0.5;
const CONFIDENCE_STEP = 0.05;

/**
 * Every matched phrase, first occurrence order, no repeats.
 */
function extractKeywords(query: string, patterns: RegExp[]): string[] {
  const keywords: string[] = [];
  for (const pattern of patterns) {
    for (const match of query.matchAll(new RegExp(pattern.source, 'gi'))) {
      if (!keywords.includes(match[0])) {
        keywords.push(match[0]);
      }
    }
  }
  return keywords;
}

/**
 * Classify a query.
 *
 * @throws ValidationError for an empty or whitespace-only query
 */
export function analyzeQuery(query: string, logger: Logger = silentLogger): QueryAnalysis {
  if (query.trim().length === 0) {
    throw new ValidationError('Query cannot be empty', ['query: must not be empty']);
  }

  const text = query.toLowerCase();

  for (const rule of RULES) {
    const matches = rule.patterns.filter((pattern) => pattern.test(text)).length;
    if (matches === 0) continue;

    const analysis: QueryAnalysis = {
      intent: rule.intent,
      confidence: Math.min(1, rule.base + matches * CONFIDENCE_STEP),
      keywords: extractKeywords(text, rule.patterns),
      contentTypes: [...rule.contentTypes],
      needsExpansion: rule.needsExpansion,
      needsReranking: rule.needsReranking,
    };
    logger.debug?.(
      `Query intent: ${analysis.intent} (confidence ${analysis.confidence.toFixed(2)})`
    );
    return analysis;
  }

  logger.debug?.(`Query intent: factual (confidence ${FACTUAL_CONFIDENCE.toFixed(2)})`);
  return {
    intent: 'factual',
    confidence: FACTUAL_CONFIDENCE,
    keywords: [],
    contentTypes: ['doc', 'code'],
    needsExpansion: false,
    needsReranking: true,
  };
}
