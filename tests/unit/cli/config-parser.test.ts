import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { parseConfigFile, parseConfigText } from '../../../src/cli/config/parser.js';
import { ConfigError } from '../../../src/utils/errors.js';

const fixture = (name: string) => fileURLToPath(new URL(`../../fixtures/${name}`, import.meta.url));

describe('parseConfigText', () => {
  it('should parse YAML', () => {
    expect(parseConfigText('derive:\n  mode: strict\n  maxDepth: 8\n', 'yaml')).toEqual({
      derive: { mode: 'strict', maxDepth: 8 },
    });
  });

  it('should treat an empty document as empty config', () => {
    expect(parseConfigText('', 'yaml')).toEqual({});
  });

  it('should reject unknown settings', () => {
    expect(() => parseConfigText('{"derive":{"mode":"loose"}}', 'json')).toThrow(ConfigError);
    expect(() => parseConfigText('{"sampling":{}}', 'json')).toThrow(ConfigError);
  });

  it('should reject malformed text', () => {
    expect(() => parseConfigText('{', 'json')).toThrow('Failed to parse config file: <inline>');
  });
});

describe('parseConfigFile', () => {
  it('should read a YAML config file', () => {
    expect(parseConfigFile(fixture('derive.config.yaml'))).toEqual({
      derive: { mode: 'lenient', recordName: 'Order', maxSchemas: 2 },
      output: { pretty: false },
    });
  });

  it('should reject unsupported extensions', () => {
    expect(() => parseConfigFile('settings.toml')).toThrow('Unsupported config file format');
  });
});
