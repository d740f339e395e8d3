/**
 * Progress Reporter
 *
 * Manages progress display for collection builds.
 * Supports multiple output modes:
 * - Interactive: an ora spinner updated after every batch
 * - JSON: NDJSON event stream for CI/CD integration
 * - Text: Simple text output for non-TTY environments
 *
 * Spinner updates are throttled (100ms minimum) to prevent flickering.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Configuration options for the ProgressReporter.
 */
export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Print every batch in text mode */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

/**
 * Final outcome of a build, as shown to the user.
 */
export interface BuildSummary {
  collection: string;
  /** False when an existing collection was reused */
  created: boolean;
  entryCount: number;
  batches: number;
  skipped: number;
  /** Files discovered under the indexed directory */
  files: number;
  durationMs: number;
}

export type ProgressEventType = 'start' | 'progress' | 'warning' | 'failed' | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  data: Record<string, unknown>;
}

/**
 * @example
 * ```typescript
 * const reporter = createProgressReporter({ json: ctx.options.json });
 *
 * reporter.start('docs', source.files.length);
 * const result = await builder.buildOrReuse('docs', source, {
 *   onProgress: (batch, written) => reporter.batch(batch, written),
 * });
 * reporter.complete({ collection: 'docs', ...result, files, durationMs });
 * ```
 */
export class ProgressReporter {
  private options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private collection = '';
  private lastUpdateTime = 0;

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  start(collection: string, files: number): void {
    this.collection = collection;
    const text = `Indexing ${files.toLocaleString()} file${files === 1 ? '' : 's'} into "${collection}"`;

    if (this.options.json) {
      this.emitJson('start', { collection, files });
    } else if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({ text: `${text}...` }).start();
    } else {
      console.log(`${text}...`);
    }
  }

  /**
   * Report a written batch.
   *
   * @param batchIndex - 0-based index of the batch just written
   * @param entriesWritten - Total entries written so far
   */
  batch(batchIndex: number, entriesWritten: number): void {
    if (this.options.json) {
      this.emitJson('progress', { batch: batchIndex, entriesWritten });
      return;
    }

    const text = `Batch ${batchIndex + 1}: ${entriesWritten.toLocaleString()} chunks written`;

    if (this.options.isInteractive && this.spinner) {
      const now = performance.now();
      if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
        return;
      }
      this.lastUpdateTime = now;
      this.spinner.text = text;
    } else if (this.options.verbose) {
      console.log(chalk.dim(`  ${text}`));
    }
  }

  warn(message: string): void {
    if (this.options.json) {
      this.emitJson('warning', { message });
      return;
    }

    if (this.options.isInteractive && this.spinner) {
      this.spinner.warn(chalk.yellow(message));
      this.spinner = ora({ text: `Indexing "${this.collection}"...` }).start();
    } else {
      console.warn(chalk.yellow(`Warning: ${message}`));
    }
  }

  /**
   * Stop the spinner after a failed build. The error itself is reported
   * by the global error handler.
   */
  fail(message: string): void {
    if (this.options.json) {
      this.emitJson('failed', { collection: this.collection, message });
      return;
    }
    this.spinner?.fail(`Indexing "${this.collection}" failed`);
    this.spinner = null;
  }

  complete(summary: BuildSummary): void {
    if (this.options.json) {
      this.emitJson('complete', { ...summary });
      return;
    }

    const headline = summary.created
      ? `Indexed ${summary.entryCount.toLocaleString()} chunks into "${summary.collection}"`
      : `Collection "${summary.collection}" is already built (${summary.entryCount.toLocaleString()} chunks)`;

    if (this.spinner) {
      this.spinner.succeed(headline);
      this.spinner = null;
    } else {
      console.log(chalk.green(`✓ ${headline}`));
    }

    if (summary.created) {
      console.log('');
      console.log(`  ${chalk.dim('Files:')}          ${summary.files.toLocaleString()}`);
      console.log(`  ${chalk.dim('Batches:')}        ${summary.batches.toLocaleString()}`);
      if (summary.skipped > 0) {
        console.log(`  ${chalk.dim('Blank skipped:')}  ${summary.skipped.toLocaleString()}`);
      }
      console.log(`  ${chalk.dim('Time elapsed:')}   ${formatDuration(summary.durationMs)}`);
    } else {
      console.log(chalk.dim('  Run with --rebuild to index again.'));
    }
  }

  private emitJson(type: ProgressEventType, data: Record<string, unknown>): void {
    const event: ProgressEvent = { type, timestamp: new Date().toISOString(), data };
    console.log(JSON.stringify(event));
  }
}

/**
 * Format milliseconds as human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a ProgressReporter with sensible defaults.
 */
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
