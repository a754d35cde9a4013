/**
 * Tests for rainbow.config.yaml loading and validation
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  createSignatureTable,
  findConfig,
  loadConfigFile,
  parseConfig,
} from '../../src/cli-config.js';
import { ConfigurationError } from '../../src/index.js';

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error('Expected a configuration error');
}

describe('parseConfig', () => {
  it('treats an empty document as the default configuration', () => {
    expect(parseConfig('cfg.yaml', null)).toEqual(createDefaultConfig());
  });

  it('reads functions, globals, maxDepth and prelude', () => {
    const config = parseConfig('cfg.yaml', {
      functions: {
        double: {
          params: [{ name: 'double', type: 'number' }],
          returns: 'number',
          effects: ['Log'],
        },
      },
      globals: { input: '[ string... ]' },
      maxDepth: 10,
      prelude: true,
    });
    expect(config).toEqual({
      functions: {
        double: {
          params: [{ name: 'double', type: 'number' }],
          returns: 'number',
          effects: ['Log'],
        },
      },
      globals: { input: '[ string... ]' },
      maxDepth: 10,
      prelude: true,
    });
  });

  it('reads descriptions', () => {
    const config = parseConfig('cfg.yaml', {
      functions: {
        double: {
          params: [{ name: 'double', type: 'number', description: 'Value' }],
          returns: 'number',
          description: 'Doubles a number',
        },
      },
    });
    expect(config.functions['double']?.description).toBe('Doubles a number');
    expect(config.functions['double']?.params[0]?.description).toBe('Value');
  });

  it('rejects a non-string description', () => {
    const err = configError(() =>
      parseConfig('cfg.yaml', {
        functions: { f: { params: [], returns: 'number', description: 7 } },
      })
    );
    expect(err.context?.['reason']).toBe('functions.f.description must be a string');
  });

  it('rejects unknown keys [RBW-C003]', () => {
    const err = configError(() => parseConfig('cfg.yaml', { bogus: 1 }));
    expect(err.errorId).toBe('RBW-C003');
    expect(err.message).toBe('Invalid configuration in cfg.yaml: unknown key bogus');
  });

  it('rejects a non-list parameter section', () => {
    const err = configError(() =>
      parseConfig('cfg.yaml', { functions: { f: { params: 'x', returns: 'number' } } })
    );
    expect(err.context?.['reason']).toBe('functions.f.params must be a list');
  });

  it('rejects a non-positive maxDepth', () => {
    const err = configError(() => parseConfig('cfg.yaml', { maxDepth: 0 }));
    expect(err.context?.['reason']).toBe('maxDepth must be a positive integer');
  });

  it('rejects non-string globals', () => {
    const err = configError(() => parseConfig('cfg.yaml', { globals: { n: 3 } }));
    expect(err.context?.['reason']).toBe(
      'globals.n must be a type notation string'
    );
  });

  it('rejects a non-boolean variadic flag', () => {
    const err = configError(() =>
      parseConfig('cfg.yaml', {
        functions: {
          f: {
            params: [{ name: 'f', type: 'number', variadic: 'yes' }],
            returns: 'number',
          },
        },
      })
    );
    expect(err.context?.['reason']).toBe(
      'functions.f.params[0].variadic must be true or false'
    );
  });
});

describe('configuration files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rainbow-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns null when no file exists', () => {
    expect(findConfig(dir)).toBeNull();
  });

  it('loads YAML from the working directory', () => {
    writeFileSync(
      join(dir, CONFIG_FILE_NAME),
      [
        'functions:',
        '  divide:',
        '    params:',
        '      - { name: divide, type: number }',
        '      - { name: by, type: number }',
        '    returns: number',
        '    partial: true',
        'globals:',
        '  limit: number',
      ].join('\n')
    );
    const config = findConfig(dir);
    expect(config?.globals).toEqual({ limit: 'number' });
    expect(config?.functions['divide']?.partial).toBe(true);
  });

  it('reports invalid YAML [RBW-C003]', () => {
    const path = join(dir, 'broken.yaml');
    writeFileSync(path, 'functions: [');
    const err = configError(() => loadConfigFile(path));
    expect(err.errorId).toBe('RBW-C003');
    expect(String(err.context?.['reason'])).toMatch(/^invalid YAML/);
  });

  it('reports unreadable files [RBW-C003]', () => {
    const err = configError(() => loadConfigFile(join(dir, 'absent.yaml')));
    expect(String(err.context?.['reason'])).toMatch(/^failed to read file/);
  });
});

describe('createSignatureTable', () => {
  it('registers configured functions and the prelude', () => {
    const table = createSignatureTable({
      ...createDefaultConfig(),
      functions: {
        double: { params: [{ name: 'double', type: 'number' }], returns: 'number' },
      },
      prelude: true,
    });
    expect(table.has('double')).toBe(true);
    expect(table.has('each')).toBe(true);
  });

  it('installs the prelude on request', () => {
    const table = createSignatureTable(createDefaultConfig(), { prelude: true });
    expect(table.has('sum')).toBe(true);
    expect(createSignatureTable(createDefaultConfig()).size).toBe(0);
  });

  it('rejects invalid signatures [RBW-C002]', () => {
    const err = configError(() =>
      createSignatureTable({
        ...createDefaultConfig(),
        functions: { f: { params: [], returns: 'number' } },
      })
    );
    expect(err.errorId).toBe('RBW-C002');
  });
});
