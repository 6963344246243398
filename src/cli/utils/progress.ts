/**
 * Progress Reporter
 *
 * Progress display for `hrag index`. Three output modes:
 * - Interactive: an ora spinner updated per file
 * - JSON: NDJSON events for CI
 * - Text: one line per stage for non-TTY output
 *
 * Spinner updates are throttled to one per 100ms.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { IndexProgress, IndexRepositoryReport } from '../../indexer/types.js';

export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;
  /** List failed files in the summary */
  verbose: boolean;
  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;
  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

export type ProgressEventType = 'start' | 'file' | 'warning' | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  data: Record<string, unknown>;
}

/**
 * ProgressReporter manages all progress display during indexing.
 *
 * ```typescript
 * const reporter = createProgressReporter({ json: false });
 * reporter.start('/repo', ['cloud']);
 * await indexRepository(store, { root: '/repo', onFile: (event) => reporter.file(event) });
 * reporter.showSummary(report, elapsedMs);
 * ```
 */
export class ProgressReporter {
  private options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private lastUpdateTime = 0;

  private static readonly UPDATE_THROTTLE_MS = 100;
  private static readonly MAX_PATH_LENGTH = 40;

  constructor(options: ProgressReporterOptions) {
    this.options = options;
    if (options.noColor) {
      chalk.level = 0;
    }
  }

  start(root: string, targets: string[]): void {
    if (this.options.json) {
      this.emitJson({ type: 'start', timestamp: new Date().toISOString(), data: { root, targets } });
      return;
    }

    const label = `Indexing ${root} → ${targets.join(', ')}`;
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({ text: `${label}...`, prefixText: chalk.cyan('Index'.padEnd(12)) }).start();
    } else {
      console.log(`${label}...`);
    }
  }

  file(event: IndexProgress): void {
    if (this.options.json) {
      this.emitJson({ type: 'file', timestamp: new Date().toISOString(), data: { ...event } });
      return;
    }

    if (!event.ok && !this.options.isInteractive) {
      console.warn(chalk.yellow(`Warning: failed to index ${event.filePath}`));
    }

    const now = performance.now();
    if (!this.spinner || now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    const percentage = Math.round((event.processed / Math.max(event.total, 1)) * 100);
    const progressText = `${event.processed}/${event.total} (${percentage}%)`;
    this.spinner.text = `${progressText.padEnd(25)} ${chalk.dim(this.truncatePath(event.filePath))}`;
  }

  warn(message: string): void {
    if (this.options.json) {
      this.emitJson({ type: 'warning', timestamp: new Date().toISOString(), data: { message } });
      return;
    }
    console.warn(chalk.yellow(`Warning: ${message}`));
  }

  showSummary(report: IndexRepositoryReport, durationMs: number): void {
    if (this.options.json) {
      this.emitJson({
        type: 'complete',
        timestamp: new Date().toISOString(),
        data: { report, durationMs },
      });
      return;
    }

    if (this.spinner) {
      const files = `${report.filesProcessed.toLocaleString()} files`;
      if (report.errors > 0) {
        this.spinner.warn(`${files} (${report.errors} errors)`);
      } else {
        this.spinner.succeed(files);
      }
      this.spinner = null;
    }

    console.log('');
    console.log(chalk.green.bold('Index Complete ✓'));
    console.log('');
    console.log(`  ${chalk.dim('Doc chunks:')}       ${report.docsIndexed.toLocaleString()}`);
    console.log(`  ${chalk.dim('Code chunks:')}      ${report.codeIndexed.toLocaleString()}`);
    console.log(`  ${chalk.dim('Files processed:')}  ${report.filesProcessed.toLocaleString()}`);
    if (report.filesSkipped > 0) {
      console.log(`  ${chalk.dim('Files skipped:')}    ${report.filesSkipped.toLocaleString()}`);
    }
    for (const [target, cleanup] of Object.entries(report.cleanup)) {
      if (cleanup && cleanup.marked > 0) {
        console.log(`  ${chalk.dim(`Removed (${target}):`)}${' '.repeat(Math.max(1, 8 - target.length))}${cleanup.marked} chunks from ${cleanup.files.length} deleted files`);
      }
    }
    console.log(`  ${chalk.dim('Time elapsed:')}     ${formatDuration(durationMs)}`);

    if (report.failures.length > 0) {
      console.log('');
      console.log(chalk.yellow(`  ${report.failures.length} failure(s) during indexing`));
      if (this.options.verbose) {
        for (const failure of report.failures.slice(0, 5)) {
          const where = failure.backend ? ` [${failure.backend}]` : '';
          console.log(chalk.dim(`    - ${failure.filePath || '(collection)'}${where}: ${failure.message}`));
        }
        if (report.failures.length > 5) {
          console.log(chalk.dim(`    ... and ${report.failures.length - 5} more`));
        }
      }
    }

    console.log('');
  }

  private emitJson(event: ProgressEvent): void {
    console.log(JSON.stringify(event));
  }

  private truncatePath(path: string): string {
    if (path.length <= ProgressReporter.MAX_PATH_LENGTH) {
      return path;
    }
    return '...' + path.slice(-(ProgressReporter.MAX_PATH_LENGTH - 3));
  }
}

/**
 * Format milliseconds as a human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
  });
}
