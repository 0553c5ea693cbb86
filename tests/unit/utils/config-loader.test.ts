import { describe, it, expect } from 'vitest';
import {
  isDerivationMode,
  loadBatchOptions,
  validateBatchOptions,
} from '../../../src/utils/config-loader.js';
import { DEFAULT_BATCH_OPTIONS } from '../../../src/types/options.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('loadBatchOptions', () => {
  it('should fall back to defaults', () => {
    expect(loadBatchOptions()).toEqual(DEFAULT_BATCH_OPTIONS);
  });

  it('should prefer CLI options over the config file', () => {
    const options = loadBatchOptions(
      { mode: 'lenient', maxSchemas: 5 },
      { mode: 'strict', maxSchemas: 2, recordName: 'Event', coalesceWidening: true },
    );
    expect(options).toEqual({
      mode: 'lenient',
      recordName: 'Event',
      maxDepth: 64,
      maxSchemas: 5,
      coalesceWidening: true,
    });
  });

  it('should reject an unknown mode', () => {
    expect(() => loadBatchOptions({ mode: 'loose' })).toThrow(ConfigError);
  });

  it('should reject out-of-range numbers', () => {
    expect(() => loadBatchOptions({ maxDepth: 0 })).toThrow('maxDepth must be a positive integer');
    expect(() => loadBatchOptions({ maxSchemas: 1.5 })).toThrow(ConfigError);
  });
});

describe('validateBatchOptions', () => {
  it('should reject an empty record name', () => {
    expect(() => validateBatchOptions({ ...DEFAULT_BATCH_OPTIONS, recordName: '' })).toThrow(
      'Record name must not be empty',
    );
  });
});

describe('isDerivationMode', () => {
  it('should accept only strict and lenient', () => {
    expect(isDerivationMode('strict')).toBe(true);
    expect(isDerivationMode('lenient')).toBe(true);
    expect(isDerivationMode('STRICT')).toBe(false);
  });
});
