/**
 * Trace Reporter for Playwright
 *
 * Prints every failing test with a shortened stack trace: frames from
 * suppressed prefixes are folded into one summary line per contiguous run.
 *
 * @example
 * ```typescript
 * // playwright.config.ts
 * import { defineConfig } from '@playwright/test';
 * import { traceReporter } from 'trace-reporter';
 *
 * export default defineConfig({
 *   reporter: [
 *     traceReporter({ maxFailures: 5 })
 *   ],
 * });
 * ```
 */

import type {
  Reporter,
  FullConfig,
  Suite,
  TestCase,
  TestResult,
  FullResult,
  TestError,
} from '@playwright/test/reporter';
import * as path from 'path';

import type { TraceReporterOptions, ResolvedOptions } from './types';
import { reportError } from './filter';
import { LOG_PREFIX } from './suppression';

/** Default configuration values */
const DEFAULTS: ResolvedOptions = {
  filter: true,
  maxFailures: Infinity,
  outputStream: process.stdout,
};

/**
 * Validate and resolve options with defaults.
 */
export function resolveOptions(options: TraceReporterOptions = {}): ResolvedOptions {
  const maxFailures =
    options.maxFailures === undefined || options.maxFailures === false
      ? DEFAULTS.maxFailures
      : options.maxFailures;

  const resolved: ResolvedOptions = {
    filter: options.filter ?? DEFAULTS.filter,
    maxFailures,
    outputStream: options.outputStream ?? DEFAULTS.outputStream,
  };

  if (resolved.maxFailures < 1) {
    console.warn(`${LOG_PREFIX} maxFailures must be >= 1 or false, using default`);
    resolved.maxFailures = DEFAULTS.maxFailures;
  }

  return resolved;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

class TraceReporter implements Reporter {
  private readonly options: ResolvedOptions;
  private failureCount = 0;
  private passedCount = 0;
  private skippedCount = 0;
  private flakyCount = 0;
  private totalDuration = 0;
  private suppressedCount = 0;

  constructor(options: TraceReporterOptions = {}) {
    this.options = resolveOptions(options);
  }

  onBegin(config: FullConfig, suite: Suite): void {
    const totalTests = suite.allTests().length;
    this.write(`Running ${plural(totalTests, 'test')} using ${plural(config.workers, 'worker')}`);
  }

  onTestEnd(test: TestCase, result: TestResult): void {
    this.totalDuration += result.duration;

    if (result.status === 'skipped') {
      this.skippedCount++;
      return;
    }

    if (result.status === 'passed') {
      if (result.retry === 0) {
        this.passedCount++;
      } else {
        this.flakyCount++;
      }
      return;
    }

    // Only the final attempt counts
    if (result.retry < test.retries) {
      return;
    }

    this.failureCount++;
    if (this.failureCount > this.options.maxFailures) {
      this.suppressedCount++;
      return;
    }

    this.emitFailure(test, result);
  }

  onEnd(result: FullResult): void {
    if (this.suppressedCount > 0) {
      this.write(
        `${plural(this.suppressedCount, 'more failure')} not shown (maxFailures=${this.options.maxFailures})`
      );
    }

    this.write(
      `${result.status}: ${this.passedCount} passed, ${this.failureCount} failed, ` +
        `${this.flakyCount} flaky, ${this.skippedCount} skipped (${this.totalDuration}ms)`
    );
  }

  /** Emit a single failure block with one filtered trace per error */
  private emitFailure(test: TestCase, result: TestResult): void {
    const retrySuffix = result.retry > 0 ? ` [retry ${result.retry}]` : '';
    const heading = `✘ ${test.title} (${path.basename(test.location.file)}:${test.location.line})${retrySuffix}`;

    const traces = this.getErrors(result).map((error) =>
      reportError(error, this.options.filter).replace(/\n$/, '')
    );

    this.write([heading, ...traces].join('\n'));
  }

  private getErrors(result: TestResult): Array<TestError | string> {
    if (result.errors.length > 0) return result.errors;
    if (result.error) return [result.error];
    return [`Test ${result.status} without an error`];
  }

  /** Write output to the configured stream */
  private write(content: string): void {
    this.options.outputStream.write(content + '\n');
  }
}

export default TraceReporter;
