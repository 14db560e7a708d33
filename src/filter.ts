/**
 * Trace Reporter - Public Entry Points
 * Filtered stack traces that never throw.
 */

import type { ErrorRecord } from './types';
import { renderTrace } from './formatter';
import { getSuppressionSet, LOG_PREFIX } from './suppression';
import { describeThrown, toErrorRecord } from './stackParser';

function safely(render: () => string): string {
  try {
    return render();
  } catch (err) {
    const description = describeThrown(err);
    console.error(`${LOG_PREFIX} Error filtering stack trace: ${description}`);
    return description;
  }
}

/**
 * Filter a chained error.
 *
 * @param shouldFilter - false prints every frame of the deepest error
 * @returns the report, or the rendering of whatever failed while producing it
 */
export function report(error: ErrorRecord, shouldFilter = true): string {
  return safely(() =>
    renderTrace(error, { shouldFilter, suppressed: getSuppressionSet().prefixes })
  );
}

/**
 * Filter any thrown value, following its `cause` chain.
 */
export function reportError(error: unknown, shouldFilter = true): string {
  return safely(() => report(toErrorRecord(error), shouldFilter));
}
