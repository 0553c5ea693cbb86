import { describe, it, expect } from 'vitest';
import { classifyValue, integerKind } from '../../../src/lib/inferencer/classifier.js';
import {
  parsedBoolean,
  parsedNull,
  parsedNumber,
  parsedString,
} from '../../../src/types/parsed-value.js';
import { ErrorCode } from '../../../src/utils/errors.js';

const HUGE = '1234567890123456789012345678901234567890123456';

describe('integerKind', () => {
  it('should keep 32-bit bounds as int', () => {
    expect(integerKind('2147483647')).toBe('int');
    expect(integerKind('-2147483648')).toBe('int');
  });

  it('should widen just past 32 bits to long', () => {
    expect(integerKind('2147483648')).toBe('long');
    expect(integerKind('-2147483649')).toBe('long');
    expect(integerKind('9223372036854775807')).toBe('long');
  });

  it('should return undefined past 64 bits', () => {
    expect(integerKind('9223372036854775808')).toBeUndefined();
    expect(integerKind('-9223372036854775809')).toBeUndefined();
  });
});

describe('classifyValue', () => {
  it('should classify non-numeric scalars', () => {
    expect(classifyValue(parsedNull, 'strict')).toEqual({ ok: true, value: 'null' });
    expect(classifyValue(parsedBoolean(false), 'strict')).toEqual({ ok: true, value: 'boolean' });
    expect(classifyValue(parsedString(''), 'strict')).toEqual({ ok: true, value: 'string' });
  });

  it('should pick the narrowest integer kind', () => {
    expect(classifyValue(parsedNumber('9999239'), 'strict')).toEqual({ ok: true, value: 'int' });
    expect(classifyValue(parsedNumber('1202021021034'), 'strict')).toEqual({ ok: true, value: 'long' });
  });

  it('should treat fractions and exponents as double', () => {
    expect(classifyValue(parsedNumber('1e16'), 'strict')).toEqual({ ok: true, value: 'double' });
    expect(classifyValue(parsedNumber('1.0'), 'strict')).toEqual({ ok: true, value: 'double' });
    expect(classifyValue(parsedNumber(0.5), 'strict')).toEqual({ ok: true, value: 'double' });
  });

  it('should fail on integers beyond 64 bits in strict mode', () => {
    const result = classifyValue(parsedNumber(HUGE), 'strict', '$.n');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.RANGE_ERROR);
      expect(result.error.path).toBe('$.n');
    }
  });

  it('should fall back to double beyond 64 bits in lenient mode', () => {
    expect(classifyValue(parsedNumber(HUGE), 'lenient')).toEqual({ ok: true, value: 'double' });
  });

  it('should fail a literal wrongly marked integral instead of throwing', () => {
    expect(classifyValue({ kind: 'number', literal: '1.5', integral: true }, 'lenient', '$.n')).toEqual({
      ok: false,
      error: {
        code: ErrorCode.INPUT_READ_ERROR,
        message: 'Number literal "1.5" is marked integral but is not an integer',
        path: '$.n',
      },
    });
  });
});
