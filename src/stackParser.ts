/**
 * Trace Reporter - Native Error Adapter
 * Converts thrown JavaScript values into ErrorRecords by parsing V8 stack text.
 */

import type { ErrorRecord, TraceFrame } from './types';
import { MAX_CAUSE_DEPTH } from './formatter';

// "    at functionName (/app/src/server.ts:10:30)"
// "    at /app/src/server.ts:10:30"
const FRAME_RE = /^\s*at\s+(.+?)\s*$/;
const CALL_RE = /^(.*?) \((.*)\)$/;
const POSITION_RE = /^(.*?)(?::\d+){1,2}$/;
const NODE_MODULES_RE = /[\\/]node_modules[\\/]/;

interface MutableErrorRecord {
  display: string;
  frames: TraceFrame[];
  cause?: ErrorRecord;
}

/**
 * Identify the module a file belongs to: the path below the last
 * node_modules directory for dependencies, otherwise the file itself.
 */
export function toModuleId(file: string): string {
  const stripped = file.startsWith('file://') ? file.slice('file://'.length) : file;
  const parts = stripped.split(NODE_MODULES_RE);
  if (parts.length > 1) {
    return parts[parts.length - 1].replace(/\\/g, '/');
  }
  return stripped;
}

/**
 * Parse a single `at ...` line. Returns null for non-frame lines.
 */
export function parseFrame(line: string): TraceFrame | null {
  const match = line.match(FRAME_RE);
  if (!match) return null;

  const body = match[1];
  const call = body.match(CALL_RE);
  const functionName = call ? call[1] : '';
  const location = call ? call[2] : body;

  const position = location.match(POSITION_RE);
  const origin = position ? toModuleId(position[1]) : functionName.replace(/^async /, '');

  return { origin, display: body };
}

export function parseStack(stack?: string): TraceFrame[] {
  if (!stack) return [];

  const frames: TraceFrame[] = [];
  for (const line of stack.split(/\r?\n/)) {
    const frame = parseFrame(line);
    if (frame) frames.push(frame);
  }
  return frames;
}

/**
 * Split a stack into its header and frames. Frame lines are only looked for
 * after the message, so an `at ...` line inside a multi-line message stays in
 * the header.
 */
function splitStack(stack: string, message: string): { header: string; frames: TraceFrame[] } {
  const found = message ? stack.indexOf(message) : -1;
  const messageEnd = found === -1 ? 0 : found + message.length;
  const lines = stack.slice(messageEnd).split(/\r?\n/);
  const firstFrame = lines.findIndex((line) => FRAME_RE.test(line));
  const headerLines = firstFrame === -1 ? lines : lines.slice(0, firstFrame);

  return {
    header: (stack.slice(0, messageEnd) + headerLines.join('\n')).trimEnd(),
    frames: firstFrame === -1 ? [] : parseStack(lines.slice(firstFrame).join('\n')),
  };
}

/**
 * `Name: message`, or just `Name` when the message is empty.
 */
export function describeError(error: Error): string {
  const name = error.name || 'Error';
  return error.message ? `${name}: ${error.message}` : name;
}

/**
 * Textual rendering of any thrown value. Never throws, even for errors
 * whose `name` or `message` accessors do.
 */
export function describeThrown(value: unknown): string {
  try {
    return value instanceof Error ? describeError(value) : String(value);
  } catch {
    try {
      return String(value);
    } catch {
      return 'Unknown error';
    }
  }
}

function toRecord(value: unknown): MutableErrorRecord {
  if (value instanceof Error) {
    const { frames } = splitStack(value.stack ?? '', value.message);
    return { display: describeError(value), frames };
  }

  if (typeof value === 'object' && value !== null) {
    const stack = 'stack' in value && typeof value.stack === 'string' ? value.stack : '';
    const message = 'message' in value && typeof value.message === 'string' ? value.message : '';
    const { header, frames } = splitStack(stack, message);
    let display = header || message;
    if (!display && 'value' in value && typeof value.value === 'string') {
      display = value.value;
    }
    return { display, frames };
  }

  return { display: describeThrown(value), frames: [] };
}

function causeOf(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && 'cause' in value) {
    return value.cause;
  }
  return undefined;
}

/**
 * Adapt a thrown value (Error, error-like object such as a Playwright
 * TestError, or primitive) and its `cause` chain.
 * A cyclic cause chain becomes a cyclic record chain.
 */
export function toErrorRecord(value: unknown): ErrorRecord {
  const seen = new Map<unknown, MutableErrorRecord>();
  const root = toRecord(value);
  seen.set(value, root);

  let previous = root;
  let current = causeOf(value);

  for (let depth = 1; depth <= MAX_CAUSE_DEPTH && current !== undefined && current !== null; depth++) {
    const existing = seen.get(current);
    if (existing) {
      previous.cause = existing;
      break;
    }

    const record = toRecord(current);
    seen.set(current, record);
    previous.cause = record;
    previous = record;
    current = causeOf(current);
  }

  return root;
}
