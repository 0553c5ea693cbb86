import { describe, it, expect } from 'vitest';
import {
  coalesceGroups,
  deriveEach,
  deriveSchemas,
  groupBySchema,
  rankGroups,
  tryDeriveSchemas,
} from '../../../src/lib/aggregator/index.js';
import { DEFAULT_BATCH_OPTIONS } from '../../../src/types/options.js';
import { parsedMapping, parsedNumber } from '../../../src/types/parsed-value.js';
import { ErrorCode, NoSchemaDerivedError } from '../../../src/utils/errors.js';

const SHAPE_A = '{"id":1,"name":"a"}';
const SHAPE_B = '{"active":true,"id":2,"name":"b"}';
const SHAPE_C = '{"id":1.5,"name":"c"}';

// 3/2/2 split: A at 0,3,6; B at 1,4; C at 2,5
const SEVEN = [SHAPE_A, SHAPE_B, SHAPE_C, SHAPE_A, SHAPE_B, SHAPE_C, SHAPE_A];

const SCHEMA_A = {
  type: 'record',
  name: 'Record',
  fields: [
    { name: 'id', type: 'int' },
    { name: 'name', type: 'string' },
  ],
};

describe('deriveSchemas', () => {
  it('should rank strict groups by count, then by earliest member', () => {
    const report = deriveSchemas(SEVEN);
    expect(report.mode).toBe('strict');
    expect(report.schemas).toEqual([
      { schema: SCHEMA_A, messagesMatched: [0, 3, 6], numMessagesMatched: 3 },
      {
        schema: {
          type: 'record',
          name: 'Record',
          fields: [
            { name: 'active', type: 'boolean' },
            { name: 'id', type: 'int' },
            { name: 'name', type: 'string' },
          ],
        },
        messagesMatched: [1, 4],
        numMessagesMatched: 2,
      },
      {
        schema: {
          type: 'record',
          name: 'Record',
          fields: [
            { name: 'id', type: 'double' },
            { name: 'name', type: 'string' },
          ],
        },
        messagesMatched: [2, 5],
        numMessagesMatched: 2,
      },
    ]);
    expect(report.unmatched).toEqual([]);
  });

  it('should return only the top schema in lenient mode', () => {
    const report = deriveSchemas(SEVEN, { mode: 'lenient' });
    expect(report).toEqual({
      mode: 'lenient',
      totalDocuments: 7,
      unmatched: [],
      schemas: [{ schema: SCHEMA_A }],
    });
  });

  it('should cap the number of strict groups', () => {
    const report = deriveSchemas(SEVEN, { maxSchemas: 1 });
    expect(report.schemas).toHaveLength(1);
  });

  it('should fail when no document derives in strict mode', () => {
    const batch = ['{"F":[1.5,true,2.5]}'];
    expect(() => deriveSchemas(batch)).toThrow(NoSchemaDerivedError);

    const lenient = deriveSchemas(batch, { mode: 'lenient' });
    expect(lenient.schemas).toEqual([
      {
        schema: {
          type: 'record',
          name: 'Record',
          fields: [{ name: 'F', type: { type: 'array', items: 'double' } }],
        },
      },
    ]);
  });

  it('should fail an empty batch', () => {
    const result = tryDeriveSchemas([], { mode: 'lenient' });
    expect(result).toEqual({
      ok: false,
      error: {
        code: ErrorCode.NO_SCHEMA_DERIVED,
        message: 'No documents were supplied',
        path: '$',
      },
    });
  });

  it('should list unmatched documents without aborting the batch', () => {
    const report = deriveSchemas([SHAPE_A, '{"F":[1.5,true]}', 'not json', SHAPE_A]);
    expect(report.schemas).toEqual([
      { schema: SCHEMA_A, messagesMatched: [0, 3], numMessagesMatched: 2 },
    ]);
    expect(report.unmatched.map((entry) => [entry.index, entry.code])).toEqual([
      [1, ErrorCode.TYPE_CONFLICT],
      [2, ErrorCode.INPUT_READ_ERROR],
    ]);
    expect(report.unmatched[0]).toEqual({
      index: 1,
      code: ErrorCode.TYPE_CONFLICT,
      message: 'Cannot unify double with boolean',
      path: '$.F[]',
    });
  });

  it('should isolate a reserved key and a malformed parsed number to their documents', () => {
    const report = deriveSchemas([
      '{"__proto__":1,"a":2}',
      parsedMapping([['a', { kind: 'number', literal: '1.5', integral: true }]]),
      '{"a":3}',
    ]);
    expect(report.schemas).toEqual([
      {
        schema: { type: 'record', name: 'Record', fields: [{ name: 'a', type: 'int' }] },
        messagesMatched: [2],
        numMessagesMatched: 1,
      },
    ]);
    expect(report.unmatched).toEqual([
      {
        index: 0,
        code: ErrorCode.INVALID_NAME,
        message: 'Field name "__proto__" is not supported',
        path: '$',
      },
      {
        index: 1,
        code: ErrorCode.INPUT_READ_ERROR,
        message: 'Number literal "1.5" is marked integral but is not an integer',
        path: '$.a',
      },
    ]);
  });

  it('should merge numerically widened groups when coalescing', () => {
    const report = deriveSchemas(SEVEN, { coalesceWidening: true });
    expect(report.schemas).toEqual([
      {
        schema: {
          type: 'record',
          name: 'Record',
          fields: [
            { name: 'id', type: 'double' },
            { name: 'name', type: 'string' },
          ],
        },
        messagesMatched: [0, 2, 3, 5, 6],
        numMessagesMatched: 5,
      },
      expect.objectContaining({ messagesMatched: [1, 4], numMessagesMatched: 2 }),
    ]);
  });

  it('should accept parsed values', () => {
    const report = deriveSchemas(
      [parsedMapping([['n', parsedNumber(7)]]), '{"n":8}'],
      { recordName: 'Counter' },
    );
    expect(report.schemas).toEqual([
      {
        schema: { type: 'record', name: 'Counter', fields: [{ name: 'n', type: 'int' }] },
        messagesMatched: [0, 1],
        numMessagesMatched: 2,
      },
    ]);
  });
});

describe('grouping helpers', () => {
  it('should group by rendered text in first-occurrence order', () => {
    const groups = groupBySchema(deriveEach(['[1]', '{"a":1}', '[2]'], DEFAULT_BATCH_OPTIONS));
    expect(groups.map((group) => [group.schemaText, group.indices])).toEqual([
      ['{"type":"array","items":"int"}', [0, 2]],
      ['{"type":"record","name":"Record","fields":[{"name":"a","type":"int"}]}', [1]],
    ]);
  });

  it('should rank equal counts by earliest member regardless of input order', () => {
    const groups = groupBySchema(deriveEach(['"x"', '1', '1', '"x"'], DEFAULT_BATCH_OPTIONS));
    const ranked = rankGroups([...groups].reverse());
    expect(ranked.map((group) => group.indices)).toEqual([
      [0, 3],
      [1, 2],
    ]);
  });

  it('should not coalesce shapes that need a union or a coercion', () => {
    const groups = groupBySchema(deriveEach(['[1]', '[true]', '["x"]'], DEFAULT_BATCH_OPTIONS));
    expect(coalesceGroups(groups, 64)).toHaveLength(3);
  });
});
