/**
 * Tests for checkScript observability callbacks and host input
 */

import { describe, expect, it } from 'vitest';
import {
  checkScript,
  ConfigurationError,
  formatType,
  NUMBER,
  recordOf,
  SignatureTable,
  type CallResolvedEvent,
  type CheckEndEvent,
  type CheckErrorEvent,
  type CheckStartEvent,
  type ObservabilityCallbacks,
} from '../../src/index.js';
import { check, MAX } from '../helpers/checker.js';

function recorder() {
  const starts: CheckStartEvent[] = [];
  const calls: CallResolvedEvent[] = [];
  const errors: CheckErrorEvent[] = [];
  const ends: CheckEndEvent[] = [];
  const observability: ObservabilityCallbacks = {
    onCheckStart: (event) => starts.push(event),
    onCallResolved: (event) => calls.push(event),
    onError: (event) => errors.push(event),
    onCheckEnd: (event) => ends.push(event),
  };
  return { starts, calls, errors, ends, observability };
}

describe('checkScript', () => {
  describe('observability', () => {
    it('reports the phases of a successful check', () => {
      const events = recorder();
      check('[ max: 1 or: 2 ]\n3', {
        functions: { max: MAX },
        observability: events.observability,
      });

      expect(events.starts).toEqual([{ termCount: 2 }]);
      expect(events.calls.map((e) => [e.name, e.partial])).toEqual([
        ['max', false],
      ]);
      const [call] = events.calls;
      expect(call?.type ? formatType(call.type) : null).toBe('number');
      expect(events.errors).toEqual([]);
      expect(events.ends).toHaveLength(1);
      expect(events.ends[0]?.success).toBe(true);
      expect(events.ends[0]?.errorCount).toBe(0);
      expect(events.ends[0]?.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('reports each error', () => {
      const events = recorder();
      check('[ nope missing ]', { observability: events.observability });
      expect(events.errors.map((e) => e.error.errorId)).toEqual([
        'RBW-T001',
        'RBW-T001',
      ]);
      expect(events.ends[0]).toMatchObject({ success: false, errorCount: 2 });
    });

    it('skips onCheckStart when the source does not parse', () => {
      const events = recorder();
      const result = check('{', { observability: events.observability });
      expect(result.success).toBe(false);
      expect(events.starts).toEqual([]);
      expect(events.errors.map((e) => e.error.errorId)).toEqual(['RBW-P002']);
    });
  });

  describe('globals', () => {
    it('accepts type values and notation', () => {
      const result = checkScript('[ a=x.n b=y ]', new SignatureTable(), {
        globals: { x: recordOf({ n: NUMBER }), y: '[ string... ]' },
      });
      expect(result.success && formatType(result.type)).toBe(
        '[ a=number b=[ string... ] ]'
      );
    });

    it('rejects malformed global notation', () => {
      expect(() =>
        checkScript('x', new SignatureTable(), { globals: { x: 'nmbr' } })
      ).toThrow(ConfigurationError);
    });
  });

  it('returns the coerced tree', () => {
    const result = check('try: 1 or: 2');
    if (!result.success) throw new Error('expected success');
    const [term] = result.ast.terms;
    expect(term?.type === 'Apply' && term.args.map((a) => a.value.type)).toEqual([
      'Block',
      'Block',
    ]);
  });

  it('honours maxDepth', () => {
    const result = check('[ [ [ 1 ] ] ]', { maxDepth: 3 });
    expect(result.success ? [] : result.errors.map((e) => e.errorId)).toEqual([
      'RBW-P004',
    ]);
  });
});
