/**
 * Segment 06: Playlist Resolver Tests
 *
 * Depth-first flattening of one pass: nested playlists, conditions at every
 * level, rule expansion against the rule-state store and the depth guard.
 */

import { describe, it, expect } from 'vitest';
import { resolve, resolvePass } from '../src/playlist-resolver';
import { createRuleStateStore, type RuleStateStore } from '../src/internal/rule-state-store';
import { DepthExceededError, ResolutionError } from '../src/errors';
import type { CompiledDocument } from '../src/domain-types';
import type { LocalDateTime } from '../src/time-date';
import { compiled, datetime, v2, MONDAY_10AM, TUESDAY_10AM } from './helpers/documents';

function ids(
  doc: CompiledDocument,
  pass: number,
  store: RuleStateStore = createRuleStateStore(),
  now: LocalDateTime = MONDAY_10AM,
): string[] {
  return resolvePass(doc, { pass, now, ruleState: store }).map((s) => s.screenId);
}

// ============================================================================
// 1. FLATTENING
// ============================================================================

describe('Flattening', () => {
  it('expands nested playlists in order', () => {
    const doc = compiled(v2({ main: ['a', { playlist: 'inner' }, 'd'], inner: ['b', 'c'] }, [{ playlist: 'main' }, 'z']));
    expect(ids(doc, 0)).toEqual(['a', 'b', 'c', 'd', 'z']);
  });

  it('tags each screen with its path and pass', () => {
    const doc = compiled(v2({ main: [{ screen: 'w', params: { units: 'metric' } }] }, [{ playlist: 'main' }]));
    expect(resolvePass(doc, { pass: 4, now: MONDAY_10AM, ruleState: createRuleStateStore() })).toEqual([
      { kind: 'screen', screenId: 'w', params: { units: 'metric' }, path: 'playlists.main.steps[0]', pass: 4 },
    ]);
  });

  it('flattens inline step blocks', () => {
    const doc = compiled(v2({}, ['a', { steps: ['b', { steps: ['c'] }] }]));
    expect(ids(doc, 0)).toEqual(['a', 'b', 'c']);
  });

  it('resolves an arbitrary entry list', () => {
    const doc = compiled(v2({ main: ['a'], extra: ['x', 'y'] }, [{ playlist: 'main' }]));
    const extra = doc.playlists.get('extra');
    if (!extra) throw new Error('missing playlist');
    const screens = resolve(doc, extra.steps, { pass: 0, now: MONDAY_10AM, ruleState: createRuleStateStore() });
    expect(screens.map((s) => s.screenId)).toEqual(['x', 'y']);
  });

  it('returns nothing for an empty sequence', () => {
    expect(ids(compiled(v2({}, [])), 0)).toEqual([]);
  });
});

// ============================================================================
// 2. CONDITIONS
// ============================================================================

describe('Conditions', () => {
  it('skips steps whose condition fails', () => {
    const doc = compiled(v2({}, ['a', { screen: 'm', conditions: { days_of_week: ['mon'] } }, 'b']));
    expect(ids(doc, 0, undefined, MONDAY_10AM)).toEqual(['a', 'm', 'b']);
    expect(ids(doc, 0, undefined, TUESDAY_10AM)).toEqual(['a', 'b']);
  });

  it('skips a whole playlist when its own condition fails', () => {
    const doc = v2({ morning: ['coffee', 'news'] }, [{ playlist: 'morning' }, 'clock']);
    doc.playlists = { morning: { steps: ['coffee', 'news'], conditions: { time_of_day: [{ start: '06:00', end: '09:00' }] } } };
    const c = compiled(doc);
    expect(ids(c, 0, undefined, MONDAY_10AM)).toEqual(['clock']);
    expect(ids(c, 0, undefined, datetime('2025-01-06T07:00'))).toEqual(['coffee', 'news', 'clock']);
  });

  it('does not advance a rule whose condition fails', () => {
    const doc = compiled(v2({}, [{ cycle: ['X', 'Y'], conditions: { days_of_week: ['mon'] } }]));
    const store = createRuleStateStore();
    expect(ids(doc, 0, store, MONDAY_10AM)).toEqual(['X']);
    expect(ids(doc, 1, store, TUESDAY_10AM)).toEqual([]);
    expect(ids(doc, 2, store, MONDAY_10AM)).toEqual(['Y']);
  });
});

// ============================================================================
// 3. RULES
// ============================================================================

describe('Rules', () => {
  it('advances a cycle once per pass through the shared store', () => {
    const doc = compiled(v2({}, [{ cycle: ['X', 'Y', 'Z'] }]));
    const store = createRuleStateStore();
    const seen = [0, 1, 2, 3].map((pass) => ids(doc, pass, store));
    expect(seen).toEqual([['X'], ['Y'], ['Z'], ['X']]);
    expect(store.snapshot()).toEqual({ 'sequence[0]': { index: 1, signature: '{"cycle":["X","Y","Z"]}' } });
  });

  it('advances a shared playlist cycle at each reference', () => {
    const doc = compiled(v2({ shared: [{ cycle: ['X', 'Y', 'Z'] }] }, [{ playlist: 'shared' }, { playlist: 'shared' }]));
    const store = createRuleStateStore();
    expect(ids(doc, 0, store)).toEqual(['X', 'Y']);
    expect(ids(doc, 1, store)).toEqual(['Z', 'X']);
  });

  it('gates every rules on the pass number', () => {
    const doc = compiled(v2({}, ['a', { every: 3, phase: 2, screen: 'w' }]));
    expect([0, 1, 2, 3, 4, 5].map((pass) => ids(doc, pass))).toEqual([['a'], ['a'], ['a', 'w'], ['a'], ['a'], ['a', 'w']]);
  });

  it('expands a playlist chosen by a cycle', () => {
    const doc = compiled(v2({ promo: ['p1', 'p2'] }, [{ cycle: ['solo', { playlist: 'promo' }] }]));
    const store = createRuleStateStore();
    expect(ids(doc, 0, store)).toEqual(['solo']);
    expect(ids(doc, 1, store)).toEqual(['p1', 'p2']);
  });

  it('keeps nested cycle state separate from its parent', () => {
    const doc = compiled(v2({}, [{ cycle: [{ cycle: ['a', 'b'] }, 'c'] }]));
    const store = createRuleStateStore();
    expect([0, 1, 2, 3].map((pass) => ids(doc, pass, store))).toEqual([['a'], ['c'], ['b'], ['c']]);
  });

  it('ignores state written by a different rule at the same path', () => {
    const doc = compiled(v2({}, [{ cycle: ['X', 'Y'] }]));
    const store = createRuleStateStore({ 'sequence[0]': { index: 1, signature: '{"cycle":["A","B"]}' } });
    expect(ids(doc, 0, store)).toEqual(['X']);
  });

  it('raises on corrupted state for the same rule', () => {
    const doc = compiled(v2({}, [{ cycle: ['X', 'Y'] }]));
    const store = createRuleStateStore({ 'sequence[0]': { index: 7, signature: '{"cycle":["X","Y"]}' } });
    expect(() => ids(doc, 0, store)).toThrow(ResolutionError);
    expect(() => ids(doc, 0, store)).toThrow('sequence[0]: Rule state corrupted: index 7 outside 0..1');
  });
});

// ============================================================================
// 4. DEPTH GUARD
// ============================================================================

describe('Depth guard', () => {
  const chain = v2(
    { p0: [{ playlist: 'p1' }], p1: [{ playlist: 'p2' }], p2: [{ playlist: 'p3' }], p3: ['leaf'] },
    [{ playlist: 'p0' }],
  );

  it('resolves within the limit', () => {
    expect(ids(compiled(chain), 0)).toEqual(['leaf']);
  });

  it('fails with the path of the first step past the limit', () => {
    const doc = compiled(chain);
    const run = () => resolvePass(doc, { pass: 0, now: MONDAY_10AM, ruleState: createRuleStateStore(), maxDepth: 3 });
    expect(run).toThrow(DepthExceededError);
    expect(run).toThrow('playlists.p2.steps[0]: Maximum nesting depth 3 exceeded');
  });
});
