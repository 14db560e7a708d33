/**
 * Trace Reporter
 *
 * Shortened stack traces for chained errors, and a Playwright reporter
 * that prints them for failing tests.
 *
 * @packageDocumentation
 */

// Playwright reporter
export { default as TraceReporter } from './reporter';
export { default } from './reporter';

import type { TraceReporterOptions } from './types';

// Types
export type {
  TraceFrame,
  ErrorRecord,
  SuppressionSet,
  SuppressionSource,
  RenderOptions,
  TraceReporterOptions,
  ResolvedOptions,
} from './types';

// Filtering
export { report, reportError } from './filter';
export {
  DEFAULT_SUPPRESSED_PREFIXES,
  RESOURCE_NAME,
  getSuppressionSet,
  loadSuppressionSet,
  parsePackagesResource,
} from './suppression';
export { renderTrace, formatSkippedMessage, MAX_CAUSE_DEPTH } from './formatter';
export { parseStack, toErrorRecord } from './stackParser';

/**
 * Helper to configure the reporter with type safety
 */
export function traceReporter(
  options: TraceReporterOptions = {}
): ['trace-reporter', TraceReporterOptions] {
  return ['trace-reporter', options];
}
