/**
 * Configuration Loader for rainbow-check
 * Loads and validates rainbow.config.yaml files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { installPrelude } from './prelude.js';
import { ConfigurationError } from './types.js';
import {
  SignatureTable,
  type FunctionDefinition,
  type ParamDefinition,
} from './typing/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file looked up in the working directory */
export const CONFIG_FILE_NAME = 'rainbow.config.yaml';

// ============================================================
// CONFIGURATION SHAPE
// ============================================================

export interface RainbowConfig {
  /** Host function signatures by name */
  readonly functions: Readonly<Record<string, FunctionDefinition>>;
  /** Input variable types in type notation */
  readonly globals: Readonly<Record<string, string>>;
  readonly maxDepth?: number | undefined;
  /** Install the standard prelude */
  readonly prelude: boolean;
}

export function createDefaultConfig(): RainbowConfig {
  return { functions: {}, globals: {}, prelude: false };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(path: string, reason: string): ConfigurationError {
  return new ConfigurationError('RBW-C003', { path, reason });
}

function optionalBoolean(
  path: string,
  where: string,
  value: unknown
): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw invalid(path, `${where} must be true or false`);
  }
  return value;
}

function optionalString(
  path: string,
  where: string,
  value: unknown
): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw invalid(path, `${where} must be a string`);
  }
  return value;
}

function parseParam(path: string, where: string, value: unknown): ParamDefinition {
  if (!isRecord(value)) {
    throw invalid(path, `${where} must be a mapping`);
  }
  const { name, type } = value;
  if (typeof name !== 'string') {
    throw invalid(path, `${where}.name must be a string`);
  }
  if (typeof type !== 'string') {
    throw invalid(path, `${where}.type must be a type notation string`);
  }
  return {
    name,
    type,
    variadic: optionalBoolean(path, `${where}.variadic`, value['variadic']),
    optional: optionalBoolean(path, `${where}.optional`, value['optional']),
    description: optionalString(path, `${where}.description`, value['description']),
  };
}

function parseFunction(path: string, name: string, value: unknown): FunctionDefinition {
  const where = `functions.${name}`;
  if (!isRecord(value)) {
    throw invalid(path, `${where} must be a mapping`);
  }

  const { params, returns, effects } = value;
  if (!Array.isArray(params)) {
    throw invalid(path, `${where}.params must be a list`);
  }
  if (typeof returns !== 'string') {
    throw invalid(path, `${where}.returns must be a type notation string`);
  }

  let effectTags: string[] | undefined;
  if (effects !== undefined) {
    if (!Array.isArray(effects) || !effects.every((e) => typeof e === 'string')) {
      throw invalid(path, `${where}.effects must be a list of strings`);
    }
    effectTags = effects.filter((e): e is string => typeof e === 'string');
  }

  return {
    params: params.map((param, i) => parseParam(path, `${where}.params[${i}]`, param)),
    returns,
    partial: optionalBoolean(path, `${where}.partial`, value['partial']),
    effects: effectTags,
    description: optionalString(path, `${where}.description`, value['description']),
  };
}

/**
 * Validate parsed YAML against the configuration shape.
 *
 * @throws ConfigurationError RBW-C003 naming the offending key
 */
export function parseConfig(path: string, data: unknown): RainbowConfig {
  // an empty document parses to null
  if (data === null || data === undefined) return createDefaultConfig();
  if (!isRecord(data)) {
    throw invalid(path, 'must be a mapping');
  }

  const known = new Set(['functions', 'globals', 'maxDepth', 'prelude']);
  for (const key of Object.keys(data)) {
    if (!known.has(key)) throw invalid(path, `unknown key ${key}`);
  }

  const functions: Record<string, FunctionDefinition> = {};
  if (data['functions'] !== undefined) {
    if (!isRecord(data['functions'])) {
      throw invalid(path, 'functions must be a mapping');
    }
    for (const [name, value] of Object.entries(data['functions'])) {
      functions[name] = parseFunction(path, name, value);
    }
  }

  const globals: Record<string, string> = {};
  if (data['globals'] !== undefined) {
    if (!isRecord(data['globals'])) {
      throw invalid(path, 'globals must be a mapping');
    }
    for (const [name, value] of Object.entries(data['globals'])) {
      if (typeof value !== 'string') {
        throw invalid(path, `globals.${name} must be a type notation string`);
      }
      globals[name] = value;
    }
  }

  const maxDepth = data['maxDepth'];
  if (
    maxDepth !== undefined &&
    (typeof maxDepth !== 'number' || !Number.isInteger(maxDepth) || maxDepth < 1)
  ) {
    throw invalid(path, 'maxDepth must be a positive integer');
  }

  return {
    functions,
    globals,
    maxDepth,
    prelude: optionalBoolean(path, 'prelude', data['prelude']) ?? false,
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load and validate a YAML configuration file.
 *
 * @throws ConfigurationError RBW-C003 if the file cannot be read, is not
 * valid YAML, or has the wrong shape
 */
export function loadConfigFile(path: string): RainbowConfig {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw invalid(
      path,
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let data: unknown;
  try {
    data = yaml.parse(content);
  } catch (err) {
    throw invalid(
      path,
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }
  return parseConfig(path, data);
}

/**
 * Load rainbow.config.yaml from a directory.
 *
 * @returns null if the file does not exist
 */
export function findConfig(cwd: string): RainbowConfig | null {
  const path = join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(path)) return null;
  return loadConfigFile(path);
}

/**
 * Build the signature table a configuration describes.
 *
 * @throws ConfigurationError RBW-C002 for an invalid function signature
 */
export function createSignatureTable(
  config: RainbowConfig,
  options: { prelude?: boolean } = {}
): SignatureTable {
  const table = new SignatureTable();
  for (const [name, definition] of Object.entries(config.functions)) {
    table.registerFunction(name, definition);
  }
  if (config.prelude || options.prelude === true) {
    installPrelude(table);
  }
  return table;
}
