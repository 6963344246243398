import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';

import { createAskCommand } from '../ask.js';
import { openRuntime } from '../../runtime.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import { noAnswerText } from '../../../agent/ask-pipeline.js';
import { HybridPointStore } from '../../../store/hybrid-store.js';
import { createRecordingContext, FakeEmbedder, InMemoryBackend, type RecordingContext } from '../../../test-utils/index.js';
import { silentLogger } from '../../../utils/logger.js';

vi.mock('../../runtime.js', () => ({
  openRuntime: vi.fn(),
}));

describe('createAskCommand', () => {
  let recording: RecordingContext;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  async function runCommand(json: boolean, ...args: string[]) {
    recording = createRecordingContext({ json });
    const program = new Command();
    program.addCommand(createAskCommand(() => recording.ctx));
    await program.parseAsync(['node', 'test', 'ask', ...args]);
  }

  beforeEach(() => {
    const embedder = new FakeEmbedder();
    const store = new HybridPointStore({ primary: new InMemoryBackend('cloud'), embedder, logger: silentLogger });
    vi.mocked(openRuntime).mockReturnValue({ config: DEFAULT_CONFIG, store, embedder });
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  it('takes a question argument and a --context option', () => {
    const command = createAskCommand(() => createRecordingContext().ctx);

    expect(command.name()).toBe('ask');
    expect(command.registeredArguments[0]?.name()).toBe('question');
    expect(command.options.map((option) => option.long)).toEqual(['--context']);
  });

  it('answers with no information on an empty index', async () => {
    await runCommand(false, 'How does token refresh work?');

    expect(recording.logs[0]).toBe(noAnswerText('How does token refresh work?'));
    expect(recording.logs.at(-1)).toContain('hrag stats');
  });

  it('prints the structured answer in JSON mode', async () => {
    await runCommand(true, 'How does token refresh work?');

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0])) as Record<string, unknown>;
    expect(output).toMatchObject({
      question: 'How does token refresh work?',
      answer: noAnswerText('How does token refresh work?'),
      citations: { count: 0, citations: [] },
      results: [],
    });
  });

  it('rejects an empty question', async () => {
    await expect(runCommand(false, '  ')).rejects.toThrow('Question cannot be empty');
  });
});
