/**
 * Segment 02: Condition Evaluation Tests
 *
 * Day-of-week and time-of-day guards: parsing from document JSON and
 * evaluation against an explicit wall-clock instant.
 */

import { describe, it, expect } from 'vitest';
import {
  parseCondition,
  evaluateCondition,
  windowContains,
  timeWindow,
  onDays,
  during,
} from '../src/condition-evaluation';
import { ConfigError } from '../src/errors';
import { datetime, MONDAY_10AM, TUESDAY_10AM } from './helpers/documents';

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

// ============================================================================
// 1. CONSTRUCTORS
// ============================================================================

describe('timeWindow', () => {
  it('converts HH:MM bounds to seconds since midnight', () => {
    expect(timeWindow('09:00', '17:00')).toEqual({ start: 32400, end: 61200 });
  });

  it('rejects an out-of-range hour', () => {
    expect(() => timeWindow('25:00', '26:00')).toThrow("start: time values must be HH:MM, got '25:00'");
  });
});

// ============================================================================
// 2. WINDOWS
// ============================================================================

describe('windowContains', () => {
  const business = timeWindow('09:00', '17:00');
  const overnight = timeWindow('22:00', '02:00');

  it('includes the start and excludes the end', () => {
    expect(windowContains(business, 32400)).toBe(true);
    expect(windowContains(business, 61199)).toBe(true);
    expect(windowContains(business, 61200)).toBe(false);
  });

  it('wraps overnight ranges past midnight', () => {
    expect(windowContains(overnight, 23 * 3600)).toBe(true);
    expect(windowContains(overnight, 3600)).toBe(true);
    expect(windowContains(overnight, 2 * 3600)).toBe(false);
    expect(windowContains(overnight, 12 * 3600)).toBe(false);
  });

  it('treats an equal start and end as empty', () => {
    const empty = timeWindow('08:00', '08:00');
    expect(windowContains(empty, 8 * 3600)).toBe(false);
    expect(windowContains(empty, 0)).toBe(false);
  });
});

// ============================================================================
// 3. EVALUATION
// ============================================================================

describe('evaluateCondition', () => {
  it('passes when there is no condition', () => {
    expect(evaluateCondition(undefined, MONDAY_10AM)).toBe(true);
  });

  it('checks the weekday', () => {
    const weekdays = onDays('mon', 'wed', 'fri');
    expect(evaluateCondition(weekdays, MONDAY_10AM)).toBe(true);
    expect(evaluateCondition(weekdays, TUESDAY_10AM)).toBe(false);
  });

  it('passes when any window matches', () => {
    const condition = during(timeWindow('06:00', '08:00'), timeWindow('09:30', '11:00'));
    expect(evaluateCondition(condition, MONDAY_10AM)).toBe(true);
    expect(evaluateCondition(condition, datetime('2025-01-06T08:30'))).toBe(false);
  });

  it('requires both weekday and time when both are set', () => {
    const condition = { ...onDays('mon'), ...during(timeWindow('12:00', '13:00')) };
    expect(evaluateCondition(condition, datetime('2025-01-06T12:15'))).toBe(true);
    expect(evaluateCondition(condition, MONDAY_10AM)).toBe(false);
    expect(evaluateCondition(condition, datetime('2025-01-07T12:15'))).toBe(false);
  });

  it('uses the evening date for overnight windows', () => {
    const condition = parseCondition({ days_of_week: ['fri'], time_of_day: [{ start: '22:00', end: '02:00' }] }, 'c');
    // Friday 23:00 passes, Saturday 01:00 is a Saturday reading
    expect(evaluateCondition(condition, datetime('2025-01-10T23:00'))).toBe(true);
    expect(evaluateCondition(condition, datetime('2025-01-11T01:00'))).toBe(false);
  });
});

// ============================================================================
// 4. PARSING
// ============================================================================

describe('parseCondition', () => {
  it('returns undefined for absent conditions', () => {
    expect(parseCondition(undefined, 'c')).toBeUndefined();
    expect(parseCondition(null, 'c')).toBeUndefined();
  });

  it('returns undefined when nothing is constrained', () => {
    expect(parseCondition({}, 'c')).toBeUndefined();
    expect(parseCondition({ days_of_week: [], time_of_day: [] }, 'c')).toBeUndefined();
  });

  it('parses weekday names case-insensitively', () => {
    const condition = parseCondition({ days_of_week: ['Monday', 'TUE'] }, 'c');
    expect(condition?.daysOfWeek).toEqual(new Set(['mon', 'tue']));
    expect(condition?.timeOfDay).toBeUndefined();
  });

  it('accepts a single weekday string', () => {
    expect(parseCondition({ days_of_week: 'sun' }, 'c')?.daysOfWeek).toEqual(new Set(['sun']));
  });

  it('accepts the day_of_week and time_ranges spellings', () => {
    const condition = parseCondition({ day_of_week: ['sat'], time_ranges: [{ start: '06:00', end: '12:00' }] }, 'c');
    expect(condition).toEqual({ daysOfWeek: new Set(['sat']), timeOfDay: [{ start: 21600, end: 43200 }] });
  });

  it('accepts a single range object', () => {
    const condition = parseCondition({ time_of_day: { start: '09:00', end: '17:00' } }, 'c');
    expect(condition?.timeOfDay).toEqual([{ start: 32400, end: 61200 }]);
  });

  it('names the offending weekday with its path', () => {
    const err = configError(() => parseCondition({ days_of_week: ['mon', 'someday'] }, 'sequence[0].conditions'));
    expect(err.path).toBe('sequence[0].conditions.days_of_week[1]');
    expect(err.message).toBe("sequence[0].conditions.days_of_week[1]: Unknown day-of-week 'someday'");
  });

  it('names the offending time with its path', () => {
    const err = configError(() => parseCondition({ time_of_day: [{ start: '25:00', end: '26:00' }] }, 'c'));
    expect(err.path).toBe('c.time_of_day[0].start');
    expect(err.detail).toBe("time values must be HH:MM, got '25:00'");
  });

  it('requires both range bounds', () => {
    expect(() => parseCondition({ time_of_day: [{ start: '09:00' }] }, 'c')).toThrow('c.time_of_day[0].end: range requires an end time');
    expect(() => parseCondition({ time_of_day: [{ end: '09:00' }] }, 'c')).toThrow('c.time_of_day[0].start: range requires a start time');
  });

  it('rejects a non-object conditions value', () => {
    expect(() => parseCondition('weekends', 'c')).toThrow('c: conditions must be an object');
  });

  it('rejects a non-list days_of_week', () => {
    expect(() => parseCondition({ days_of_week: 5 }, 'c')).toThrow('c.days_of_week: days_of_week must be a list of weekday names');
  });
});
