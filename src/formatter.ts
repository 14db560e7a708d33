/**
 * Trace Reporter - Text Formatter
 * Renders a cause chain and the filtered frames of its deepest error.
 */

import type { ErrorRecord, RenderOptions, TraceFrame } from './types';
import { findSuppressedPrefix } from './suppression';

export const INDENT = '\t';

/** Upper bound on the number of records walked in a cause chain */
export const MAX_CAUSE_DEPTH = 100;

/** Cause chain from the root to the deepest reachable record */
export interface CauseChain {
  records: ErrorRecord[];
  /** True when a cycle or the depth bound stopped the walk before the chain ended */
  truncated: boolean;
}

/**
 * Walk the cause chain, stopping at a revisited record or at MAX_CAUSE_DEPTH.
 */
export function collectCauseChain(root: ErrorRecord): CauseChain {
  const records: ErrorRecord[] = [];
  const visited = new Set<ErrorRecord>();
  let current: ErrorRecord | null | undefined = root;

  while (current && !visited.has(current) && records.length < MAX_CAUSE_DEPTH) {
    visited.add(current);
    records.push(current);
    current = current.cause;
  }

  return { records, truncated: current !== null && current !== undefined };
}

/**
 * Header lines: `Exception: <root>` followed by one `Caused by:` line per cause.
 */
export function formatExceptionChain(chain: CauseChain): string[] {
  const lines = chain.records.map(
    (record, i) => `${i === 0 ? 'Exception: ' : 'Caused by: '}${record.display ?? ''}`
  );
  if (chain.truncated) {
    lines.push(`Caused by: [cause chain truncated after ${chain.records.length} errors]`);
  }
  return lines;
}

// 37 lines skipped for {org.h2, org.hibernate, sun., java.lang.reflect.Method}
export function formatSkippedMessage(prefixes: Iterable<string>, skippedLines: number): string {
  const list = Array.from(prefixes).join(', ');
  return `${INDENT}${INDENT}${skippedLines} line${skippedLines === 1 ? '' : 's'} skipped for {${list}}`;
}

/**
 * Kept frames and skipped-run summaries, in stack order.
 * The first frame is always kept so the crash site stays visible.
 */
export function formatFrames(frames: readonly TraceFrame[], options: RenderOptions): string[] {
  const lines: string[] = [];
  const skippedPrefixes = new Set<string>();
  let skippedLines = 0;
  let first = true;

  for (const frame of frames) {
    let forbiddenPrefix: string | null = null;

    if (options.shouldFilter && !first) {
      forbiddenPrefix = findSuppressedPrefix(frame.origin ?? '', options.suppressed);
    }

    first = false;

    if (forbiddenPrefix === null) {
      if (skippedLines > 0) {
        lines.push(formatSkippedMessage(skippedPrefixes, skippedLines));
      }

      lines.push(`${INDENT}at ${frame.display ?? ''}`);
      skippedPrefixes.clear();
      skippedLines = 0;
    } else {
      skippedLines++;
      skippedPrefixes.add(forbiddenPrefix);
    }
  }

  if (skippedLines > 0) {
    lines.push(formatSkippedMessage(skippedPrefixes, skippedLines));
  }

  return lines;
}

/**
 * Render the full report. Every line, including the last, ends with a newline.
 */
export function renderTrace(root: ErrorRecord, options: RenderOptions): string {
  const chain = collectCauseChain(root);
  const deepest = chain.records[chain.records.length - 1];
  const lines = [...formatExceptionChain(chain), ...formatFrames(deepest.frames ?? [], options)];

  return lines.join('\n') + '\n';
}
