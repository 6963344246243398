/**
 * Vector Tools
 *
 * Point-level CRUD and the two low-level searches: add_vector, get_vector,
 * update_vector, delete_vector, delete_all, search_similar and
 * search_by_metadata.
 */

import { z } from 'zod';
import { formatResultsJSON } from '../../search/formatter.js';
import { parseFilter } from '../../store/filter.js';
import { formatPointId, parsePointId } from '../../store/ids.js';
import { CONTENT_TYPES, JsonValueSchema, type ChunkInput, type StoredPoint } from '../../store/types.js';
import type { ToolRegistry } from './registry.js';
import type { ToolDeps } from './types.js';

export const CollectionSchema = z
  .enum(['cloud', 'local'])
  .default('cloud')
  .describe('Target collection: "cloud" (primary) or "local" (secondary)');

/** Accepts a number or, for ids past 2^53, its decimal string */
export const VectorIdSchema = z
  .union([z.string(), z.number()])
  .describe('Point id as a decimal string (preferred) or an integer');

const MetadataSchema = z.record(JsonValueSchema);

/** Validated by the store so a bad vector reports DIMENSION_MISMATCH */
const VectorSchema = z.unknown().describe('Pre-computed embedding; must match the configured dimensions');

const FilterSchema = z.unknown().describe('Filter with must/should/must_not conditions of {key, match}');

function describePoint(point: StoredPoint, includeVector: boolean) {
  return {
    vector_id: formatPointId(point.id),
    payload: point.payload,
    ...(includeVector && point.vector ? { vector: point.vector } : {}),
  };
}

export function registerVectorTools(registry: ToolRegistry, deps: ToolDeps): void {
  const { store } = deps;

  registry.register({
    name: 'add_vector',
    description:
      'Store a chunk of text or code. It is embedded unless a vector is supplied. ' +
      'With file_path and line_start it is anchored to that location; otherwise it is ' +
      'identified by its content.',
    inputSchema: z.object({
      content: z.string().min(1).describe('Text or code to store'),
      file_path: z.string().optional(),
      line_start: z.number().int().min(0).optional(),
      line_end: z.number().int().min(0).optional(),
      section: z.string().optional(),
      content_type: z.enum(CONTENT_TYPES).optional(),
      category: z.enum(['doc', 'code']).optional(),
      language: z.string().optional(),
      metadata: MetadataSchema.optional(),
      vector: VectorSchema.optional(),
      collection: CollectionSchema,
    }),
    execute: async (input) => {
      const chunk: ChunkInput = {
        content: input.content,
        filePath: input.file_path,
        lineStart: input.line_start,
        lineEnd: input.line_end,
        section: input.section,
        contentType: input.content_type,
        category: input.category,
        language: input.language,
        metadata: input.metadata,
      };
      const { id, payload } = await store.upsertChunk(chunk, input.collection, input.vector);
      return { vector_id: formatPointId(id), payload };
    },
  });

  registry.register({
    name: 'get_vector',
    description: 'Fetch one stored point by id, soft-deleted points included.',
    inputSchema: z.object({
      vector_id: VectorIdSchema,
      include_vector: z.boolean().default(false),
      collection: CollectionSchema,
    }),
    execute: async (input) => {
      const point = await store.getPoint(parsePointId(input.vector_id), input.collection, {
        withVector: input.include_vector,
      });
      return describePoint(point, input.include_vector);
    },
  });

  registry.register({
    name: 'update_vector',
    description:
      'Change the content, metadata or vector of a stored point. New content is re-embedded; ' +
      'metadata is merged into the existing metadata.',
    inputSchema: z.object({
      vector_id: VectorIdSchema,
      content: z.string().optional(),
      metadata: MetadataSchema.optional(),
      vector: VectorSchema.optional(),
      collection: CollectionSchema,
    }),
    execute: async (input) => {
      const point = await store.updatePoint(
        parsePointId(input.vector_id),
        { content: input.content, metadata: input.metadata, vector: input.vector },
        input.collection
      );
      return describePoint(point, false);
    },
  });

  registry.register({
    name: 'delete_vector',
    description: 'Delete a stored point. Soft delete hides it from search and can be recovered.',
    inputSchema: z.object({
      vector_id: VectorIdSchema,
      soft_delete: z.boolean().default(true),
      collection: CollectionSchema,
    }),
    execute: async (input) => {
      const { id, soft } = await store.deletePoint(
        parsePointId(input.vector_id),
        { soft: input.soft_delete },
        input.collection
      );
      return { vector_id: formatPointId(id), soft_delete: soft };
    },
  });

  registry.register({
    name: 'delete_all',
    description: 'Remove every point from a collection. Reports the count only unless confirm is true.',
    inputSchema: z.object({
      collection: CollectionSchema,
      confirm: z.boolean().default(false),
    }),
    execute: async (input) => {
      const result = await store.deleteAll(input.collection, input.confirm);
      return {
        collection: result.target,
        confirmed: result.confirmed,
        count: result.count,
        deleted: result.confirmed ? result.count : 0,
      };
    },
  });

  registry.register({
    name: 'search_similar',
    description: 'Nearest stored points to a query text or a vector. top_k is capped at 100.',
    inputSchema: z.object({
      query: z.string().optional(),
      vector: VectorSchema.optional(),
      top_k: z.number().int().min(1).default(10),
      filter: FilterSchema.optional(),
    }),
    execute: async (input) => {
      const filter = input.filter !== undefined ? parseFilter(input.filter) : undefined;
      const results = await store.searchSimilar({ query: input.query, vector: input.vector }, input.top_k, filter);
      return {
        count: results.length,
        results: formatResultsJSON(results).map(({ id, ...rest }) => ({ vector_id: id, ...rest })),
      };
    },
  });

  registry.register({
    name: 'search_by_metadata',
    description: 'Page through points whose payload matches a filter. limit is capped at 1000.',
    inputSchema: z.object({
      filter: FilterSchema,
      limit: z.number().int().min(1).default(10),
      offset: z.number().int().min(0).default(0),
      collection: CollectionSchema,
      include_deleted: z.boolean().default(false),
    }),
    execute: async (input) => {
      const page = await store.searchByMetadata(parseFilter(input.filter ?? {}), {
        limit: input.limit,
        offset: input.offset,
        target: input.collection,
        includeDeleted: input.include_deleted,
      });
      return {
        count: page.points.length,
        has_more: page.hasMore,
        offset: input.offset,
        points: page.points.map((point) => describePoint(point, false)),
      };
    },
  });
}
