/**
 * Maintenance Tools
 *
 * Indexing and the soft-delete lifecycle: index_repository,
 * cleanup_deleted, recover_deleted, permanent_delete, collection_stats.
 * Destructive tools preview unless `confirm` (or `dry_run: false`) is set.
 */

import { z } from 'zod';
import { listRepositoryFiles, indexRepository } from '../../indexer/repository.js';
import { silentLogger } from '../../utils/logger.js';
import { CollectionSchema } from './vector-tools.js';
import type { ToolRegistry } from './registry.js';
import type { ToolDeps } from './types.js';

export function registerMaintenanceTools(registry: ToolRegistry, deps: ToolDeps): void {
  const { store } = deps;
  const logger = deps.logger ?? silentLogger;
  const indexing = deps.indexing ?? {};

  registry.register({
    name: 'index_repository',
    description:
      'Index or refresh a repository. Only changed chunks are re-embedded; chunks of files ' +
      'that no longer exist are soft-deleted.',
    inputSchema: z.object({
      repository_path: z.string().min(1),
      index_docs: z.boolean().default(true),
      index_code: z.boolean().default(true),
      collection: z.enum(['cloud', 'local', 'both']).default('cloud'),
      doc_patterns: z.array(z.string()).optional(),
      code_patterns: z.array(z.string()).optional(),
    }),
    execute: async (input) =>
      indexRepository(
        store,
        {
          root: input.repository_path,
          indexDocs: input.index_docs,
          indexCode: input.index_code,
          collection: input.collection,
          docPatterns: input.doc_patterns ?? indexing.docPatterns,
          codePatterns: input.code_patterns ?? indexing.codePatterns,
          ignorePatterns: indexing.ignorePatterns,
          chunking: indexing.chunking,
        },
        logger
      ),
  });

  registry.register({
    name: 'cleanup_deleted',
    description:
      'Soft-delete chunks whose file is gone. Pass the repository to scan, or the list of paths ' +
      'that still exist. Dry run by default.',
    inputSchema: z
      .object({
        repository_path: z.string().min(1).optional(),
        existing_paths: z.array(z.string()).optional(),
        collection: CollectionSchema,
        dry_run: z.boolean().default(true),
      })
      .refine((input) => input.repository_path !== undefined || input.existing_paths !== undefined, {
        message: 'Provide repository_path or existing_paths',
        path: ['repository_path'],
      }),
    execute: async (input) => {
      let existing = input.existing_paths ?? [];
      if (input.repository_path !== undefined) {
        const files = await listRepositoryFiles(input.repository_path, indexing);
        existing = [...existing, ...files.docs, ...files.code];
      }
      return store.cleanupDeletedFiles(existing, input.collection, input.dry_run);
    },
  });

  registry.register({
    name: 'recover_deleted',
    description: 'Clear the soft-delete flag, for every chunk or for one file.',
    inputSchema: z.object({
      collection: CollectionSchema,
      file_path: z.string().optional(),
    }),
    execute: async (input) => store.recover(input.collection, { filePath: input.file_path }),
  });

  registry.register({
    name: 'permanent_delete',
    description:
      'Physically remove soft-deleted chunks, for every file or one. Irreversible; previews ' +
      'unless confirm is true.',
    inputSchema: z.object({
      collection: CollectionSchema,
      file_path: z.string().optional(),
      confirm: z.boolean().default(false),
    }),
    execute: async (input) =>
      store.permanentDelete(input.collection, { confirm: input.confirm, filePath: input.file_path }),
  });

  registry.register({
    name: 'collection_stats',
    description: 'Point counts per collection, soft-deleted included and counted separately.',
    inputSchema: z.object({}),
    execute: async () => store.collectionStats(),
  });
}
