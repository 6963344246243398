/**
 * Agent Tools
 *
 * The operations a calling agent can invoke, behind one registry. The
 * transport that exposes them (MCP, HTTP, a CLI) is the caller's concern.
 *
 * @example
 * ```typescript
 * const registry = createToolRegistry({ store, embedder });
 * const response = await registry.call('get_vector', { vector_id: '4611686018427387904' });
 * if (!response.success) console.error(response.errors[0]?.suggestions);
 * ```
 */

import { ToolRegistry } from './registry.js';
import { registerMaintenanceTools } from './maintenance-tools.js';
import { registerSearchTools } from './search-tools.js';
import { registerVectorTools } from './vector-tools.js';
import type { ToolDeps } from './types.js';

export function createToolRegistry(deps: ToolDeps): ToolRegistry {
  const registry = new ToolRegistry(deps.logger);
  registerVectorTools(registry, deps);
  registerSearchTools(registry, deps);
  registerMaintenanceTools(registry, deps);
  return registry;
}

export { ToolRegistry, formatIssues } from './registry.js';
export { registerVectorTools, CollectionSchema, VectorIdSchema } from './vector-tools.js';
export { registerSearchTools, equalityFilter } from './search-tools.js';
export { registerMaintenanceTools } from './maintenance-tools.js';
export type {
  ToolDefinition,
  ToolDeps,
  ToolMetadata,
  ToolResponse,
  RegisteredTool,
  IndexingDefaults,
} from './types.js';
