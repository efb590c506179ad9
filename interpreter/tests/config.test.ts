import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  CONFIG_FILENAME,
  ConfigError,
  DEFAULT_OPTIONS,
  MAX_DEPTH_LIMIT,
  loadConfig,
  resolveOptions,
} from '../src/config';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sprig-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(contents: string): void {
    fs.writeFileSync(path.join(dir, CONFIG_FILENAME), contents, 'utf-8');
  }

  test('defaults when nothing is configured', () => {
    expect(loadConfig(dir, {})).toEqual(DEFAULT_OPTIONS);
    expect(DEFAULT_OPTIONS.maxDepth).toBe(1000);
  });

  test('reads the config file', () => {
    writeConfig('{ "maxDepth": 50 }');
    expect(loadConfig(dir, {})).toEqual({ maxDepth: 50 });
  });

  test('an empty config object keeps the defaults', () => {
    writeConfig('{}');
    expect(loadConfig(dir, {})).toEqual(DEFAULT_OPTIONS);
  });

  test('environment overrides the file', () => {
    writeConfig('{ "maxDepth": 50 }');
    expect(loadConfig(dir, { SPRIG_MAX_DEPTH: '20' })).toEqual({ maxDepth: 20 });
  });

  test('invalid JSON is reported', () => {
    writeConfig('{ maxDepth: ');
    expect(() => loadConfig(dir, {})).toThrow(ConfigError);
    expect(() => loadConfig(dir, {})).toThrow(/sprig\.config\.json: not valid JSON/);
  });

  test('wrong value types are reported with their path', () => {
    writeConfig('{ "maxDepth": "deep" }');
    expect(() => loadConfig(dir, {})).toThrow(
      'ConfigError: invalid configuration in sprig.config.json: maxDepth: Expected number, received string',
    );
  });

  test('unknown keys are rejected', () => {
    writeConfig('{ "depth": 5 }');
    expect(() => loadConfig(dir, {})).toThrow(/Unrecognized key/);
  });

  test('non-positive environment values are rejected', () => {
    expect(() => loadConfig(dir, { SPRIG_MAX_DEPTH: '0' })).toThrow(ConfigError);
    expect(() => loadConfig(dir, { SPRIG_MAX_DEPTH: 'lots' })).toThrow(/SPRIG_MAX_DEPTH/);
  });

  test('limits above the stack-safe cap are rejected', () => {
    expect(MAX_DEPTH_LIMIT).toBe(2000);
    expect(loadConfig(dir, { SPRIG_MAX_DEPTH: '2000' })).toEqual({ maxDepth: 2000 });
    expect(() => loadConfig(dir, { SPRIG_MAX_DEPTH: '1000000' })).toThrow(
      'ConfigError: invalid configuration in environment: SPRIG_MAX_DEPTH: Number must be less than or equal to 2000',
    );
    writeConfig('{ "maxDepth": 2001 }');
    expect(() => loadConfig(dir, {})).toThrow(
      'ConfigError: invalid configuration in sprig.config.json: maxDepth: Number must be less than or equal to 2000',
    );
  });
});

describe('resolveOptions', () => {
  test('merges overrides over the defaults', () => {
    expect(resolveOptions()).toEqual(DEFAULT_OPTIONS);
    expect(resolveOptions({ maxDepth: 12 })).toEqual({ maxDepth: 12 });
  });

  test('rejects invalid overrides', () => {
    expect(() => resolveOptions({ maxDepth: -1 })).toThrow(
      /^ConfigError: invalid configuration in interpreter options: maxDepth: /,
    );
  });
});
