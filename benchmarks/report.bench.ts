import { renderTrace } from '../src/formatter';
import { reportError } from '../src/filter';
import { parseStack } from '../src/stackParser';
import { DEFAULT_SUPPRESSED_PREFIXES } from '../src/suppression';
import type { ErrorRecord, RenderOptions } from '../src/types';
import { performance } from 'perf_hooks';

const DEPTH = 1000;
const ITERATIONS = 2000;

// V8-style stack where two of every three frames come from dependencies or Node internals
function generateStack(depth: number): string {
  const lines = ['Error: Something went wrong'];
  for (let i = 0; i < depth; i++) {
    switch (i % 3) {
      case 0:
        lines.push(`    at listOnTimeout (node:internal/timers:${i}:7)`);
        break;
      case 1:
        lines.push(`    at Dispatcher.run (/app/node_modules/playwright-core/lib/dispatcher.js:${i}:3)`);
        break;
      default:
        lines.push(`    at handler${i} (/app/src/handlers.ts:${i}:5)`);
    }
  }
  return lines.join('\n');
}

function measure(label: string, run: () => string): { label: string; avgMs: string; opsPerSec: string } {
  run();
  const start = performance.now();
  for (let i = 0; i < ITERATIONS; i++) {
    run();
  }
  const avg = (performance.now() - start) / ITERATIONS;
  return { label, avgMs: avg.toFixed(4), opsPerSec: (1000 / avg).toFixed(0) };
}

const stack = generateStack(DEPTH);
const error = new Error('Something went wrong');
error.stack = stack;

const record: ErrorRecord = { display: 'Error: Something went wrong', frames: parseStack(stack) };
const jsPrefixes = new Set(['node:internal', 'playwright-core/']);
const filtered: RenderOptions = { shouldFilter: true, suppressed: jsPrefixes };
const unfiltered: RenderOptions = { shouldFilter: false, suppressed: jsPrefixes };
const javaDefaults: RenderOptions = { shouldFilter: true, suppressed: new Set(DEFAULT_SUPPRESSED_PREFIXES) };

console.log(`Stack depth: ${DEPTH} frames, ${ITERATIONS} iterations per case`);
console.table([
  measure('renderTrace, filtered', () => renderTrace(record, filtered)),
  measure('renderTrace, unfiltered', () => renderTrace(record, unfiltered)),
  measure('renderTrace, default prefixes (no match)', () => renderTrace(record, javaDefaults)),
  measure('reportError, parse + render', () => reportError(error)),
]);
