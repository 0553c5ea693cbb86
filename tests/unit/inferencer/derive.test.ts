import { describe, it, expect } from 'vitest';
import {
  deriveSchema,
  deriveTypeExpr,
  tryDeriveSchema,
  tryDeriveType,
} from '../../../src/lib/inferencer/index.js';
import {
  parsedMapping,
  parsedNumber,
  parsedSequence,
} from '../../../src/types/parsed-value.js';
import {
  ErrorCode,
  IntegerRangeError,
  InvalidNameError,
  TypeConflictError,
} from '../../../src/utils/errors.js';

function text(document: string, mode: 'strict' | 'lenient' = 'strict'): string {
  const result = tryDeriveSchema(document, { mode });
  if (!result.ok) {
    throw new Error(`derivation failed: ${result.error.message}`);
  }
  return result.value.text;
}

function failure(document: string, mode: 'strict' | 'lenient' = 'strict') {
  const result = tryDeriveSchema(document, { mode });
  if (result.ok) {
    throw new Error(`expected failure, got ${result.value.text}`);
  }
  return result.error;
}

describe('single document derivation', () => {
  it('should sort record fields alphabetically', () => {
    expect(text('{"A":1,"B":1.5,"C":true}')).toBe(
      '{"type":"record","name":"record","fields":[{"name":"A","type":"int"},{"name":"B","type":"double"},{"name":"C","type":"boolean"}]}',
    );
  });

  it('should render identically regardless of key order', () => {
    expect(text('{"C":true,"A":1,"B":1.5}')).toBe(text('{"A":1,"B":1.5,"C":true}'));
  });

  it('should widen mixed numeric array items to double', () => {
    expect(text('[1, 1.5]')).toBe('{"type":"array","items":"double"}');
  });

  it('should merge array element records field by field', () => {
    expect(text('[{"K":10},{"K":10.5}]')).toBe(
      '{"type":"array","items":{"type":"record","name":"record","fields":[{"name":"K","type":"double"}]}}',
    );
  });

  it('should synthesize a union from branch-encoded records', () => {
    expect(text('[{"array":[12]},{"long":12}]')).toBe(
      '{"type":"array","items":["long",{"name":"array","type":"array","items":"int"}]}',
    );
  });

  it('should order primitive branches by keyword', () => {
    expect(text('[{"long":12},{"double":1.5}]')).toBe(
      '{"type":"array","items":["double","long"]}',
    );
  });

  it('should reject single-field records that only differ in field name', () => {
    const error = failure('[{"K":12},{"J":12}]');
    expect(error.code).toBe(ErrorCode.INVALID_STRUCTURE);
    expect(error.path).toBe('$[].K');
    expect(error.field).toBe('K');
  });

  it('should reject a field named like a keyword it does not spell', () => {
    expect(failure('[{"kong":12},{"long":12}]').code).toBe(ErrorCode.INVALID_STRUCTURE);
  });

  it('should reject a value that does not fit its branch keyword', () => {
    expect(failure('[{"int":1.5},{"long":12}]').code).toBe(ErrorCode.INVALID_STRUCTURE);
  });

  it('should name the shared field whose types cannot be unified', () => {
    const error = failure('[{"long":12},{"long":"x"}]');
    expect(error.code).toBe(ErrorCode.INVALID_STRUCTURE);
    expect(error.field).toBe('long');
  });

  it('should name nested records after their field', () => {
    expect(text('{"address":{"zip":"x"}}')).toBe(
      '{"type":"record","name":"record","fields":[{"name":"address","type":{"type":"record","name":"address","fields":[{"name":"zip","type":"string"}]}}]}',
    );
  });

  it('should name array element records after the array field', () => {
    expect(text('{"orders":[{"id":1},{"id":2}]}')).toBe(
      '{"type":"record","name":"record","fields":[{"name":"orders","type":{"type":"array","items":{"type":"record","name":"orders","fields":[{"name":"id","type":"int"}]}}}]}',
    );
  });

  it('should use the caller supplied record name', () => {
    const result = tryDeriveSchema('{"a":null}', { recordName: 'Event' });
    expect(result.ok && result.value.text).toBe(
      '{"type":"record","name":"Event","fields":[{"name":"a","type":"null"}]}',
    );
  });

  it('should give an empty array null items', () => {
    expect(text('{"tags":[]}')).toBe(
      '{"type":"record","name":"record","fields":[{"name":"tags","type":{"type":"array","items":"null"}}]}',
    );
  });

  it('should let null elements take the type of their neighbours', () => {
    expect(text('[null, 3, null]')).toBe('{"type":"array","items":"int"}');
  });

  it('should reject empty field names at any depth', () => {
    expect(failure('{"":1}').code).toBe(ErrorCode.INVALID_NAME);

    const nested = failure('{"a":{"":1}}', 'lenient');
    expect(nested.code).toBe(ErrorCode.INVALID_NAME);
    expect(nested.path).toBe('$.a[""]');
  });

  it('should reject an empty record name', () => {
    const result = tryDeriveType('{"a":1}', { recordName: '' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.INVALID_NAME);
    }
  });

  it('should stop at the depth limit', () => {
    const result = tryDeriveType('{"a":{"b":{}}}', { maxDepth: 2 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.DEPTH_LIMIT_EXCEEDED);
      expect(result.error.path).toBe('$.a.b');
    }
  });

  it('should apply the depth limit to parsed values too', () => {
    const value = parsedMapping([['a', parsedMapping([['b', parsedMapping([])]])]]);
    const result = tryDeriveType(value, { maxDepth: 2 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.DEPTH_LIMIT_EXCEEDED);
      expect(result.error.path).toBe('$.a.b');
    }
  });

  it('should accept parsed sequences', () => {
    expect(deriveTypeExpr(parsedSequence([parsedNumber(1), parsedNumber('2.5')]))).toEqual({
      type: 'array',
      items: 'double',
    });
  });

  it('should report a malformed parsed number instead of throwing', () => {
    const value = parsedMapping([['n', { kind: 'number', literal: '1.5', integral: true }]]);
    const result = tryDeriveType(value);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.INPUT_READ_ERROR);
      expect(result.error.path).toBe('$.n');
    }
  });

  it('should read an isLosslessNumber key as a field', () => {
    expect(text('{"isLosslessNumber": true, "value": "12"}')).toBe(
      '{"type":"record","name":"record","fields":[{"name":"isLosslessNumber","type":"boolean"},{"name":"value","type":"string"}]}',
    );
  });

  it('should accept already parsed values', () => {
    const value = parsedMapping([['n', parsedNumber('1202021021034')]]);
    expect(deriveTypeExpr(value)).toEqual({
      type: 'record',
      name: 'record',
      fields: [{ name: 'n', type: 'long' }],
    });
  });

  it('should classify 1e16 as double and large integers as long', () => {
    expect(text('{"Float":1e16,"Integer":9999239,"LongName":1202021021034}')).toBe(
      '{"type":"record","name":"record","fields":[{"name":"Float","type":"double"},{"name":"Integer","type":"int"},{"name":"LongName","type":"long"}]}',
    );
  });
});

describe('strict failures', () => {
  it('should throw the matching error class', () => {
    expect(() => deriveSchema('[1, "a"]')).toThrow(TypeConflictError);
    expect(() => deriveSchema('{"":1}')).toThrow(InvalidNameError);
    expect(() => deriveSchema('{"n":1234567890123456789012345678901234567890123456}')).toThrow(
      IntegerRangeError,
    );
  });

  it('should reject boolean mixed with numbers', () => {
    const error = failure('{"F":[1.5,true,2.5]}');
    expect(error).toEqual({
      code: ErrorCode.TYPE_CONFLICT,
      message: 'Cannot unify double with boolean',
      path: '$.F[]',
    });
  });

  it('should report invalid JSON as an input read error', () => {
    expect(failure('{"a":').code).toBe(ErrorCode.INPUT_READ_ERROR);
  });
});

describe('lenient derivation', () => {
  it('should widen boolean mixed with numbers to the numeric kind', () => {
    expect(text('{"F":[1.5,true,2.5]}', 'lenient')).toBe(
      '{"type":"record","name":"record","fields":[{"name":"F","type":{"type":"array","items":"double"}}]}',
    );
  });

  it('should fall back to double for integers beyond 64 bits', () => {
    expect(text('{"n":1234567890123456789012345678901234567890123456}', 'lenient')).toBe(
      '{"type":"record","name":"record","fields":[{"name":"n","type":"double"}]}',
    );
  });

  it('should pick the majority type of conflicting elements', () => {
    expect(text('[1,"a","b"]', 'lenient')).toBe('{"type":"array","items":"string"}');
  });

  it('should break ties by first occurrence', () => {
    expect(text('[1,"a"]', 'lenient')).toBe('{"type":"array","items":"int"}');
    expect(text('["a",1]', 'lenient')).toBe('{"type":"array","items":"string"}');
  });

  it('should keep the most frequent record shape and resolve its fields by majority', () => {
    expect(text('[{"a":1},{"a":"x"},{"a":"y"},{"b":true}]', 'lenient')).toBe(
      '{"type":"array","items":{"type":"record","name":"record","fields":[{"name":"a","type":"string"}]}}',
    );
  });

  it('should count booleans apart from numbers', () => {
    expect(
      text(
        '{"flags":[0,1,true,true,true,null],"counts":[0,"x",10,100,-12,11221],"labels":[null,"a",10,100,"b","c"]}',
        'lenient',
      ),
    ).toBe(
      '{"type":"record","name":"record","fields":[{"name":"counts","type":{"type":"array","items":"int"}},{"name":"flags","type":{"type":"array","items":"boolean"}},{"name":"labels","type":{"type":"array","items":"string"}}]}',
    );
  });

  it('should keep a boolean majority inside element records', () => {
    expect(text('[{"J":true},{"J":false},{"J":1},{"J":false}]', 'lenient')).toBe(
      '{"type":"array","items":{"type":"record","name":"record","fields":[{"name":"J","type":"boolean"}]}}',
    );
  });

  it('should drop fields outside the most frequent record shape', () => {
    expect(text('[{"a":10.1,"b":1.2},{"a":-0.5,"b":1},{"a":true,"c":1}]', 'lenient')).toBe(
      '{"type":"array","items":{"type":"record","name":"record","fields":[{"name":"a","type":"double"},{"name":"b","type":"double"}]}}',
    );
  });

  it('should let numbers outvote a boolean field by field', () => {
    expect(text('[{"a":true,"b":false},{"a":-0.5,"b":1},{"a":0.1,"b":-10}]', 'lenient')).toBe(
      '{"type":"array","items":{"type":"record","name":"record","fields":[{"name":"a","type":"double"},{"name":"b","type":"int"}]}}',
    );
  });

  it('should break record shape ties by first occurrence', () => {
    expect(text('{"rows":[{"J":23,"K":23},{"J":33}]}', 'lenient')).toBe(
      '{"type":"record","name":"record","fields":[{"name":"rows","type":{"type":"array","items":{"type":"record","name":"rows","fields":[{"name":"J","type":"int"},{"name":"K","type":"int"}]}}}]}',
    );
  });

  it('should pick the majority item type of nested arrays', () => {
    const result = tryDeriveSchema(
      '{"rows":[{"J":[10,11,true]},{"J":[10,"p","q"]},{"J":["p","p",11]}]}',
      { mode: 'lenient', recordName: 'Record' },
    );
    expect(result.ok && result.value.text).toBe(
      '{"type":"record","name":"Record","fields":[{"name":"rows","type":{"type":"array","items":{"type":"record","name":"rows","fields":[{"name":"J","type":{"type":"array","items":"string"}}]}}}]}',
    );
  });

  it('should widen a boolean that ties with a number to the earlier number', () => {
    expect(text('{"F":[1.5,true]}', 'lenient')).toBe(
      '{"type":"record","name":"record","fields":[{"name":"F","type":{"type":"array","items":"double"}}]}',
    );
  });

  it('should let the largest cluster of shapes win', () => {
    expect(text('[[1],[2.5],"x"]', 'lenient')).toBe(
      '{"type":"array","items":{"type":"array","items":"double"}}',
    );
  });

  it('should never synthesize unions', () => {
    expect(text('[{"array":[12]},{"long":12}]', 'lenient')).toBe(
      '{"type":"array","items":{"type":"record","name":"record","fields":[{"name":"array","type":{"type":"array","items":"int"}}]}}',
    );
  });
});
