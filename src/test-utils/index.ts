/**
 * Test Utilities Module
 *
 * In-process stand-ins for the external capabilities.
 *
 * @example
 * ```typescript
 * import { FakeEmbedder, InMemoryBackend, makeChunk } from '../../test-utils/index.js';
 *
 * const primary = new InMemoryBackend('cloud');
 * const store = new HybridPointStore({ primary, embedder: new FakeEmbedder(), logger: silentLogger });
 * ```
 */

export { resetAll } from './reset.js';
export { FakeEmbedder } from './fake-embedder.js';
export { InMemoryBackend, type BackendOperation } from './in-memory-backend.js';
export { makeChunk, makePoint, makeResult } from './fixtures.js';
export { createRecordingContext, type RecordingContext } from './cli-context.js';
