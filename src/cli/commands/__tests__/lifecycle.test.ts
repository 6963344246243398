/**
 * Tests for the soft-delete lifecycle commands: cleanup, recover, purge
 * and stats.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { mkdirSync, mkdtempSync, rmSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';

import { createCleanupCommand } from '../cleanup.js';
import { createRecoverCommand } from '../recover.js';
import { createPurgeCommand } from '../purge.js';
import { createStatsCommand } from '../stats.js';
import type { CommandContext } from '../../types.js';
import { openRuntime } from '../../runtime.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import { indexRepository } from '../../../indexer/repository.js';
import { HybridPointStore } from '../../../store/hybrid-store.js';
import { createRecordingContext, FakeEmbedder, InMemoryBackend, type RecordingContext } from '../../../test-utils/index.js';
import { silentLogger } from '../../../utils/logger.js';

vi.mock('../../runtime.js', () => ({
  openRuntime: vi.fn(),
}));

describe('lifecycle commands', () => {
  let root: string;
  let primary: InMemoryBackend;
  let recording: RecordingContext;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  const write = (relativePath: string, content: string) => {
    const target = join(root, relativePath);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content);
  };

  async function run(
    factory: (getContext: () => CommandContext) => Command,
    json: boolean,
    ...args: string[]
  ): Promise<unknown> {
    recording = createRecordingContext({ json });
    consoleLogSpy.mockClear();
    const program = new Command();
    const command = factory(() => recording.ctx);
    program.addCommand(command);
    await program.parseAsync(['node', 'test', command.name(), ...args]);
    const printed = consoleLogSpy.mock.calls[0]?.[0];
    return json && printed !== undefined ? JSON.parse(String(printed)) : undefined;
  }

  beforeEach(async () => {
    root = mkdtempSync(join(tmpdir(), 'hrag-cli-lifecycle-'));
    write('README.md', '# Guide\nAuth flow uses short-lived tokens');
    write('src/math.ts', 'export function add(a: number, b: number): number {\n  return a + b;\n}\n');

    primary = new InMemoryBackend('cloud');
    const embedder = new FakeEmbedder();
    const store = new HybridPointStore({ primary, embedder, logger: silentLogger });
    vi.mocked(openRuntime).mockReturnValue({ config: DEFAULT_CONFIG, store, embedder });
    await indexRepository(store, { root }, silentLogger);
    unlinkSync(join(root, 'README.md'));

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    consoleLogSpy.mockRestore();
    process.exitCode = undefined;
  });

  describe('cleanup', () => {
    it('previews by default', async () => {
      const report = await run(createCleanupCommand, true, root);

      expect(report).toEqual({
        backend: 'cloud',
        dryRun: true,
        scanned: 2,
        orphaned: 1,
        marked: 0,
        failed: 0,
        files: ['README.md'],
      });
    });

    it('marks chunks with --commit', async () => {
      const report = await run(createCleanupCommand, true, root, '--commit');

      expect(report).toMatchObject({ dryRun: false, marked: 1 });
      expect(await run(createStatsCommand, true)).toEqual({
        cloud: { count: 2, deleted: 1 },
        local: null,
      });
    });

    it('lists the missing files in text mode', async () => {
      await run(createCleanupCommand, false, root);

      expect(recording.logs[0]).toContain('Would remove 1 chunks from 1 deleted files in cloud:');
      expect(recording.logs[1]).toContain('README.md');
      expect(recording.logs.at(-1)).toContain('--commit');
    });

    it('rejects an unknown collection', async () => {
      await expect(run(createCleanupCommand, true, root, '--collection', 'both')).rejects.toThrow(
        'Invalid --collection value: "both"'
      );
    });
  });

  describe('recover', () => {
    it('restores the chunks of one file', async () => {
      await run(createCleanupCommand, true, root, '--commit');

      const report = await run(createRecoverCommand, true, '--file', 'README.md');

      expect(report).toEqual({ backend: 'cloud', found: 1, recovered: 1, failed: 0 });
    });

    it('says when there is nothing to recover', async () => {
      await run(createRecoverCommand, false);

      expect(recording.logs[0]).toContain('No deleted chunks in');
    });
  });

  describe('purge', () => {
    beforeEach(async () => {
      await run(createCleanupCommand, true, root, '--commit');
    });

    it('only reports without --confirm', async () => {
      const report = await run(createPurgeCommand, true);

      expect(report).toEqual({ backend: 'cloud', confirmed: false, found: 1, deleted: 0, files: ['README.md'] });
      expect(await primary.count()).toBe(2);
    });

    it('deletes with --confirm', async () => {
      const report = await run(createPurgeCommand, true, '--confirm');

      expect(report).toMatchObject({ confirmed: true, deleted: 1 });
      expect(await primary.count()).toBe(1);
    });

    it('asks for confirmation in text mode', async () => {
      await run(createPurgeCommand, false);

      expect(recording.logs[0]).toContain('1 deleted chunks from 1 files would be removed permanently.');
      expect(recording.logs[1]).toContain('--confirm');
    });
  });

  describe('stats', () => {
    it('shows live and deleted counts per collection', async () => {
      await run(createCleanupCommand, true, root, '--commit');

      await run(createStatsCommand, false);

      expect(recording.logs.some((line) => line.includes('Chunks:') && line.endsWith(' 1'))).toBe(true);
      expect(recording.logs.some((line) => line.includes('local') && line.includes('disabled'))).toBe(true);
    });
  });
});
