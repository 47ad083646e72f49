import {
  describe,
  expect,
  it
} from 'vitest';

import {
  assertNonNullable,
  ensureNonNullable,
  isCellValue,
  isDigit,
  isRecord
} from '../src/typeGuards.ts';

describe('assertNonNullable', () => {
  it('passes for falsy but present values', () => {
    expect(() => {
      assertNonNullable(0);
    }).not.toThrow();
    expect(() => {
      assertNonNullable('');
    }).not.toThrow();
  });

  it('throws for null and undefined', () => {
    expect(() => {
      assertNonNullable(null);
    }).toThrow('Value is null');
    expect(() => {
      assertNonNullable(undefined);
    }).toThrow('Value is undefined');
  });

  it('throws the given error', () => {
    const error = new TypeError('type error');
    expect(() => {
      assertNonNullable(null, error);
    }).toThrow(error);
  });
});

describe('ensureNonNullable', () => {
  it('returns the value', () => {
    expect(ensureNonNullable(7)).toBe(7);
  });

  it('throws with custom string message', () => {
    expect(() => ensureNonNullable(undefined, 'missing row')).toThrow('missing row');
  });
});

describe('isDigit', () => {
  it('accepts integers 1-9', () => {
    expect(isDigit(1)).toBe(true);
    expect(isDigit(9)).toBe(true);
  });

  it('rejects 0, out-of-range, fractional and non-numbers', () => {
    expect(isDigit(0)).toBe(false);
    expect(isDigit(10)).toBe(false);
    expect(isDigit(2.5)).toBe(false);
    expect(isDigit('5')).toBe(false);
  });
});

describe('isCellValue', () => {
  it('accepts 0 as the empty cell', () => {
    expect(isCellValue(0)).toBe(true);
    expect(isCellValue(9)).toBe(true);
  });

  it('rejects negative numbers', () => {
    expect(isCellValue(-1)).toBe(false);
  });
});

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({ a: 1 })).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('rows')).toBe(false);
  });
});
