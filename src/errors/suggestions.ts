/**
 * Stable error codes reported at the tool boundary, with default remediation
 * suggestions for each.
 */

export const ERROR_CODES = [
  'VALIDATION_ERROR',
  'POINT_NOT_FOUND',
  'DIMENSION_MISMATCH',
  'BATCH_LIMIT_EXCEEDED',
  'BACKEND_UNAVAILABLE',
  'SYNTHESIS_FAILURE',
  'RERANK_FAILURE',
  'UNKNOWN_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export const ERROR_SUGGESTIONS: Record<ErrorCode, string[]> = {
  VALIDATION_ERROR: [
    'Check that all required fields are provided',
    'Verify field types match expected format',
    'Review input schema documentation',
  ],
  POINT_NOT_FOUND: [
    'Verify vector ID exists in collection',
    'Check if vector was deleted',
    'Use search_similar or search_by_metadata to find vector IDs',
  ],
  DIMENSION_MISMATCH: [
    'Ensure vector has the dimension of the configured embedding model',
    'Check embedding model configuration',
    'Verify every vector element is a finite number',
  ],
  BATCH_LIMIT_EXCEEDED: [
    'Reduce the number of items per request',
    'Split the operation into smaller batches',
  ],
  BACKEND_UNAVAILABLE: [
    'Check the point store URL and API key',
    'Verify the backend is running and reachable',
    'Enable the secondary backend to keep reads available',
  ],
  SYNTHESIS_FAILURE: [
    'Retry the question with different phrasing',
    'Use the search tool to inspect the raw chunks',
  ],
  RERANK_FAILURE: [
    'Check that the rerank model is available',
    'Results are still returned in vector-score order',
  ],
  UNKNOWN_ERROR: ['Check logs for more details', 'Verify input parameters'],
};
