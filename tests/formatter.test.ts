import { describe, it, expect } from 'vitest';
import {
  MAX_CAUSE_DEPTH,
  collectCauseChain,
  formatExceptionChain,
  formatFrames,
  formatSkippedMessage,
  renderTrace,
} from '../src/formatter';
import { DEFAULT_SUPPRESSED_PREFIXES } from '../src/suppression';
import type { ErrorRecord, RenderOptions, TraceFrame } from '../src/types';

const frame = (origin: string): TraceFrame => ({
  origin,
  display: `${origin}(${origin.split('.').slice(-2, -1)[0]}.java:1)`,
});

const filtered: RenderOptions = { shouldFilter: true, suppressed: new Set(DEFAULT_SUPPRESSED_PREFIXES) };
const unfiltered: RenderOptions = { ...filtered, shouldFilter: false };

interface MutableRecord {
  display: string;
  cause?: ErrorRecord;
  frames: TraceFrame[];
}

describe('formatter', () => {
  describe('formatSkippedMessage', () => {
    it('uses the singular for one line', () => {
      expect(formatSkippedMessage(['org.h2'], 1)).toBe('\t\t1 line skipped for {org.h2}');
    });

    it('lists prefixes in the order they were seen', () => {
      expect(formatSkippedMessage(['sun.', 'org.h2'], 37)).toBe('\t\t37 lines skipped for {sun., org.h2}');
    });
  });

  describe('renderTrace', () => {
    it('folds a suppressed run between two application frames', () => {
      const record: ErrorRecord = {
        display: 'IllegalStateException: boom',
        frames: [frame('A.a'), frame('org.h2.B.b'), frame('org.h2.C.c'), frame('D.d')],
      };

      expect(renderTrace(record, filtered)).toBe(
        'Exception: IllegalStateException: boom\n' +
          '\tat A.a(A.java:1)\n' +
          '\t\t2 lines skipped for {org.h2}\n' +
          '\tat D.d(D.java:1)\n'
      );
    });

    it('groups adjacent frames with different prefixes into one summary', () => {
      const record: ErrorRecord = {
        display: 'LazyInitializationException',
        frames: [
          frame('app.Main.run'),
          frame('org.hibernate.Session.load'),
          frame('sun.reflect.Accessor.invoke'),
          frame('app.Main.main'),
        ],
      };

      expect(renderTrace(record, filtered)).toBe(
        'Exception: LazyInitializationException\n' +
          '\tat app.Main.run(Main.java:1)\n' +
          '\t\t2 lines skipped for {org.hibernate, sun.}\n' +
          '\tat app.Main.main(Main.java:1)\n'
      );
    });

    it('never merges runs separated by a kept frame', () => {
      const record: ErrorRecord = {
        display: 'AssertionError',
        frames: [
          frame('app.A.a'),
          frame('org.junit.Runner.run'),
          frame('app.B.b'),
          frame('org.junit.Suite.run'),
          frame('org.junit.Main.run'),
        ],
      };

      expect(renderTrace(record, filtered)).toBe(
        'Exception: AssertionError\n' +
          '\tat app.A.a(A.java:1)\n' +
          '\t\t1 line skipped for {org.junit}\n' +
          '\tat app.B.b(B.java:1)\n' +
          '\t\t2 lines skipped for {org.junit}\n'
      );
    });

    it('always keeps the first frame', () => {
      const record: ErrorRecord = {
        display: 'SQLException',
        frames: [frame('org.h2.Engine.open'), frame('org.h2.Engine.close')],
      };

      expect(renderTrace(record, filtered)).toBe(
        'Exception: SQLException\n' +
          '\tat org.h2.Engine.open(Engine.java:1)\n' +
          '\t\t1 line skipped for {org.h2}\n'
      );
    });

    it('prints every frame when filtering is off', () => {
      const record: ErrorRecord = {
        display: 'SQLException',
        frames: [frame('app.A.a'), frame('org.h2.B.b'), frame('sun.C.c')],
      };

      expect(renderTrace(record, unfiltered)).toBe(
        'Exception: SQLException\n' +
          '\tat app.A.a(A.java:1)\n' +
          '\tat org.h2.B.b(B.java:1)\n' +
          '\tat sun.C.c(C.java:1)\n'
      );
    });

    it('prints only the header for an empty frame sequence', () => {
      expect(renderTrace({ display: 'Error: empty', frames: [] }, filtered)).toBe('Exception: Error: empty\n');
      expect(renderTrace({ display: 'Error: none' }, filtered)).toBe('Exception: Error: none\n');
    });

    it('prints the cause chain and the frames of the innermost error only', () => {
      const inner: ErrorRecord = {
        display: 'SQLException: table missing',
        frames: [frame('org.h2.Parser.parse'), frame('org.h2.Command.run'), frame('app.Dao.find')],
      };
      const middle: ErrorRecord = {
        display: 'PersistenceException: query failed',
        cause: inner,
        frames: [frame('app.Repository.load')],
      };
      const outer: ErrorRecord = {
        display: 'ServiceException: lookup failed',
        cause: middle,
        frames: [frame('app.Service.lookup')],
      };

      expect(renderTrace(outer, filtered)).toBe(
        'Exception: ServiceException: lookup failed\n' +
          'Caused by: PersistenceException: query failed\n' +
          'Caused by: SQLException: table missing\n' +
          '\tat org.h2.Parser.parse(Parser.java:1)\n' +
          '\t\t1 line skipped for {org.h2}\n' +
          '\tat app.Dao.find(Dao.java:1)\n'
      );
    });

    it('treats missing fields as empty text', () => {
      const record: ErrorRecord = { frames: [{}, { origin: 'org.h2.X.y' }] };

      expect(renderTrace(record, filtered)).toBe('Exception: \n\tat \n\t\t1 line skipped for {org.h2}\n');
    });

    it('produces the same output on repeated calls', () => {
      const record: ErrorRecord = {
        display: 'Error',
        frames: [frame('app.A.a'), frame('org.jboss.B.b'), frame('app.C.c'), frame('com.sun.D.d')],
      };

      expect(renderTrace(record, filtered)).toBe(renderTrace(record, filtered));
    });

    it('accounts for every frame as either printed or skipped', () => {
      const pool = ['app.A.a', 'org.h2.B.b', 'sun.C.c', 'org.junit.D.d'];
      const sequences: string[][] = [[]];
      for (let length = 1; length <= 4; length++) {
        for (let n = 0; n < pool.length ** length; n++) {
          const sequence: string[] = [];
          for (let k = 0, rest = n; k < length; k++, rest = Math.floor(rest / pool.length)) {
            sequence.push(pool[rest % pool.length]);
          }
          sequences.push(sequence);
        }
      }

      for (const origins of sequences) {
        const lines = renderTrace({ display: 'Error', frames: origins.map(frame) }, filtered).split('\n');
        const printed = lines.filter((line) => line.startsWith('\tat ')).length;
        const skipped = lines
          .map((line) => line.match(/^\t\t(\d+) lines? skipped for \{/))
          .reduce((sum, match) => sum + (match ? Number(match[1]) : 0), 0);

        expect(printed + skipped).toBe(origins.length);
        if (origins.length > 0) {
          expect(lines[1]).toBe(`\tat ${frame(origins[0]).display}`);
        }
      }
    });
  });

  describe('formatFrames', () => {
    it('returns no lines for no frames', () => {
      expect(formatFrames([], filtered)).toEqual([]);
    });

    it('ends with a summary when the trace ends in a suppressed run', () => {
      expect(formatFrames([frame('app.A.a'), frame('javax.servlet.F.doFilter')], filtered)).toEqual([
        '\tat app.A.a(A.java:1)',
        '\t\t1 line skipped for {javax.servlet}',
      ]);
    });
  });

  describe('collectCauseChain', () => {
    it('stops at a cycle', () => {
      const b: MutableRecord = { display: 'B', frames: [frame('app.B.b')] };
      const a: MutableRecord = { display: 'A', cause: b, frames: [] };
      b.cause = a;

      const chain = collectCauseChain(a);
      expect(chain.records).toHaveLength(2);
      expect(chain.records[0]).toBe(a);
      expect(chain.records[1]).toBe(b);
      expect(chain.truncated).toBe(true);
      expect(formatExceptionChain(chain)).toEqual([
        'Exception: A',
        'Caused by: B',
        'Caused by: [cause chain truncated after 2 errors]',
      ]);
      expect(renderTrace(a, filtered)).toBe(
        'Exception: A\nCaused by: B\nCaused by: [cause chain truncated after 2 errors]\n\tat app.B.b(B.java:1)\n'
      );
    });

    it('stops after the depth bound', () => {
      let record: ErrorRecord = { display: 'e149', frames: [frame('app.Deep.e149')] };
      for (let i = 148; i >= 0; i--) {
        record = { display: `e${i}`, cause: record, frames: [frame(`app.Deep.e${i}`)] };
      }

      const chain = collectCauseChain(record);
      expect(chain.records).toHaveLength(MAX_CAUSE_DEPTH);
      expect(chain.truncated).toBe(true);

      const lines = renderTrace(record, filtered).split('\n');
      expect(lines.filter((line) => line.startsWith('Caused by: '))).toHaveLength(MAX_CAUSE_DEPTH);
      expect(lines[MAX_CAUSE_DEPTH]).toBe('Caused by: [cause chain truncated after 100 errors]');
      expect(lines[MAX_CAUSE_DEPTH + 1]).toBe('\tat app.Deep.e99(Deep.java:1)');
    });

    it('is not truncated when the chain ends', () => {
      const chain = collectCauseChain({ display: 'A', cause: { display: 'B', cause: null } });
      expect(chain.records.map((r) => r.display)).toEqual(['A', 'B']);
      expect(chain.truncated).toBe(false);
    });
  });
});
