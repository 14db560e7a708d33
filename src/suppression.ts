/**
 * Trace Reporter - Suppressed Prefixes
 * Loads the process-wide set of origin prefixes whose frames are elided.
 *
 * Provide your own `TraceReporter.packages` file (one prefix per line) next to
 * this module or in the working directory to replace the defaults:
 *
 * ```text
 * # Packages to filter
 * node:internal
 * playwright-core/
 * org.hibernate
 * ```
 */

import * as fs from 'fs';
import * as path from 'path';
import type { SuppressionSet } from './types';

export const LOG_PREFIX = '[TraceReporter]';
export const RESOURCE_NAME = 'TraceReporter.packages';

/** Container, runtime, reflection, proxy and test-framework roots */
export const DEFAULT_SUPPRESSED_PREFIXES: readonly string[] = [
  'org.h2',
  'org.apache.catalina',
  'org.apache.coyote',
  'org.apache.tomcat',
  'com.arjuna',
  'org.apache.cxf',
  'org.hibernate',
  'org.junit',
  'org.jboss',
  'java.lang.reflect.Method',
  'sun.',
  'com.sun',
  'org.eclipse',
  'junit.framework',
  'com.sun.faces',
  'javax.faces',
  'org.richfaces',
  'org.apache.el',
  'javax.servlet',
];

const KEY_TERMINATORS = new Set(['=', ':', ' ', '\t', '\f']);
const ESCAPES: Record<string, string> = { t: '\t', n: '\n', r: '\r', f: '\f' };

let cached: SuppressionSet | undefined;

/**
 * Locations searched for the resource, in order: beside this module, then the working directory.
 */
export function resolveResourceLocations(): string[] {
  return [path.join(__dirname, RESOURCE_NAME), path.join(process.cwd(), RESOURCE_NAME)];
}

/**
 * Join continued lines (trailing odd backslash) and drop blanks and comments.
 */
function logicalLines(content: string): string[] {
  const lines: string[] = [];
  let pending: string | null = null;

  for (const raw of content.split(/\r\n|\r|\n/)) {
    const line = raw.replace(/^[ \t\f]+/, '');
    if (pending === null && (line === '' || line.startsWith('#') || line.startsWith('!'))) continue;

    const joined: string = (pending ?? '') + line;
    if (endsWithContinuation(joined)) {
      pending = joined.slice(0, -1);
      continue;
    }
    pending = null;
    lines.push(joined);
  }

  if (pending !== null) lines.push(pending);
  return lines;
}

/**
 * Extract the keys of a properties-style listing. Values are ignored.
 * Throws on a malformed `\uXXXX` escape.
 */
export function parsePackagesResource(content: string): string[] {
  const keys = new Set<string>();

  for (const line of logicalLines(content)) {
    const key = readKey(line);
    if (key) keys.add(key);
  }

  return Array.from(keys);
}

function readKey(line: string): string {
  let key = '';
  for (let i = 0; i < line.length; i++) {
    const c = line[i];
    if (KEY_TERMINATORS.has(c)) break;
    if (c !== '\\') {
      key += c;
      continue;
    }

    i++;
    if (i >= line.length) break;
    const escaped = line[i];
    if (escaped === 'u') {
      const hex = line.slice(i + 1, i + 5);
      if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
        throw new Error(`Malformed \\uXXXX encoding in key starting "${key}"`);
      }
      key += String.fromCharCode(parseInt(hex, 16));
      i += 4;
    } else {
      key += ESCAPES[escaped] ?? escaped;
    }
  }
  return key;
}

function endsWithContinuation(line: string): boolean {
  let slashes = 0;
  for (let i = line.length - 1; i >= 0 && line[i] === '\\'; i--) {
    slashes++;
  }
  return slashes % 2 === 1;
}

function defaults(): SuppressionSet {
  return { prefixes: new Set(DEFAULT_SUPPRESSED_PREFIXES), source: 'defaults' };
}

/**
 * Load the suppression set from the first existing location.
 * Never throws: a missing or unreadable resource yields the defaults.
 */
export function loadSuppressionSet(
  locations: readonly string[] = resolveResourceLocations()
): SuppressionSet {
  const location = locations.find((candidate) => fs.existsSync(candidate));

  if (location === undefined) {
    console.info(`${LOG_PREFIX} No /${RESOURCE_NAME} resource present, using defaults`);
    return defaults();
  }

  try {
    const content = fs.readFileSync(location, 'utf-8');
    return { prefixes: new Set(parsePackagesResource(content)), source: 'resource', location };
  } catch (err) {
    console.info(`${LOG_PREFIX} Could not parse /${RESOURCE_NAME} resource, using defaults`, err);
    return defaults();
  }
}

/**
 * The process-wide suppression set, loaded on first use.
 */
export function getSuppressionSet(): SuppressionSet {
  if (!cached) {
    cached = loadSuppressionSet();
  }
  return cached;
}

/**
 * Return the first prefix the origin starts with, or null when the frame is kept.
 */
export function findSuppressedPrefix(origin: string, prefixes: ReadonlySet<string>): string | null {
  for (const prefix of prefixes) {
    if (origin.startsWith(prefix)) {
      return prefix;
    }
  }
  return null;
}
