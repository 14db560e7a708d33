/**
 * Trace Reporter Types
 * Public type definitions for the trace filter and the Playwright reporter.
 */

/** One call-stack entry */
export interface TraceFrame {
  /** Qualified origin matched against suppression prefixes, e.g. `org.h2.Engine.open` */
  readonly origin?: string;
  /** Text printed after `at `, e.g. `org.h2.Engine.open(Engine.java:18)` */
  readonly display?: string;
}

/**
 * A chained error. Only the frames of the deepest record in the chain are rendered.
 */
export interface ErrorRecord {
  /** Type and message, e.g. `IllegalStateException: boom` */
  readonly display?: string;
  /** The error that caused this one */
  readonly cause?: ErrorRecord | null;
  readonly frames?: readonly TraceFrame[];
}

/** Where the active suppression prefixes came from */
export type SuppressionSource = 'resource' | 'defaults';

/** Immutable set of suppressed origin prefixes */
export interface SuppressionSet {
  readonly prefixes: ReadonlySet<string>;
  readonly source: SuppressionSource;
  /** Path of the resource file, when one was loaded */
  readonly location?: string;
}

/** Options for a single render call */
export interface RenderOptions {
  /** When false every frame is printed and nothing is summarized */
  shouldFilter: boolean;
  /** Prefixes to suppress, matched in iteration order */
  suppressed: ReadonlySet<string>;
}

/** Configuration options for the Playwright trace reporter */
export interface TraceReporterOptions {
  /** Elide frames from suppressed prefixes (default: true) */
  filter?: boolean;
  /** Maximum failures to print (default: false). Later failures are only counted. */
  maxFailures?: number | false;
  /** Custom output stream (default: process.stdout) */
  outputStream?: NodeJS.WritableStream;
}

/** Resolved options with all defaults applied */
export type ResolvedOptions = Required<Omit<TraceReporterOptions, 'maxFailures'>> & {
  maxFailures: number;
};
