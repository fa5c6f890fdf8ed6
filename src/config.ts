/**
 * Configuration Loader
 * Loads and validates begend.yaml output settings.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { ConfigError } from './types.js';

// ============================================================
// TYPES
// ============================================================

export interface OutputConfig {
  /** Print the token listing for each input */
  readonly tokens: boolean;
  /** Print the syntax tree for each input */
  readonly tree: boolean;
  /**
   * JSON output path, null to skip. `{name}` is replaced by the input's
   * base name without extension.
   */
  readonly json: string | null;
  /** Spaces per JSON nesting level */
  readonly indent: number;
}

export interface BegendConfig {
  readonly output: OutputConfig;
}

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = 'begend.yaml';

const OUTPUT_KEYS = new Set(['tokens', 'tree', 'json', 'indent']);

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): BegendConfig {
  return {
    output: {
      tokens: false,
      tree: true,
      json: 'program.json',
      indent: 2,
    },
  };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate one `output` section and merge it over the defaults.
 */
function validateOutput(
  data: unknown,
  defaults: OutputConfig,
  path: string
): OutputConfig {
  if (!isRecord(data)) {
    throw new ConfigError(path, 'output must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!OUTPUT_KEYS.has(key)) {
      throw new ConfigError(path, `unknown key output.${key}`);
    }
  }

  const { tokens, tree, json, indent } = data;

  if (tokens !== undefined && typeof tokens !== 'boolean') {
    throw new ConfigError(path, 'output.tokens must be a boolean');
  }
  if (tree !== undefined && typeof tree !== 'boolean') {
    throw new ConfigError(path, 'output.tree must be a boolean');
  }
  if (json !== undefined && json !== null && typeof json !== 'string') {
    throw new ConfigError(path, 'output.json must be a path or null');
  }
  if (json === '') {
    throw new ConfigError(path, 'output.json must not be empty');
  }
  if (
    indent !== undefined &&
    (typeof indent !== 'number' || !Number.isInteger(indent) || indent < 0)
  ) {
    throw new ConfigError(
      path,
      'output.indent must be a non-negative integer'
    );
  }

  return {
    tokens: tokens ?? defaults.tokens,
    tree: tree ?? defaults.tree,
    json: json === undefined ? defaults.json : json,
    indent: indent ?? defaults.indent,
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse and validate YAML configuration text.
 *
 * An empty document yields the defaults.
 *
 * @param path - Used in error messages only
 * @throws ConfigError on malformed YAML, unknown keys or wrong value types
 */
export function parseConfig(content: string, path: string): BegendConfig {
  let data: unknown;
  try {
    data = yaml.parse(content);
  } catch (err) {
    throw new ConfigError(
      path,
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  const defaults = createDefaultConfig();
  if (data === null || data === undefined) {
    return defaults;
  }
  if (!isRecord(data)) {
    throw new ConfigError(path, 'must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (key !== 'output') {
      throw new ConfigError(path, `unknown key ${key}`);
    }
  }

  if (data['output'] === undefined) {
    return defaults;
  }
  return { output: validateOutput(data['output'], defaults.output, path) };
}

/**
 * Load configuration.
 *
 * With an explicit path the file must exist. Otherwise begend.yaml in `cwd`
 * is used when present and the defaults when not.
 */
export function loadConfig(cwd: string, explicitPath?: string): BegendConfig {
  const configPath = explicitPath ?? join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    if (explicitPath !== undefined) {
      throw new ConfigError(configPath, 'file not found');
    }
    return createDefaultConfig();
  }

  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      configPath,
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(content, configPath);
}

/** Apply command-line overrides on top of a loaded configuration */
export function withOverrides(
  config: BegendConfig,
  overrides: Partial<OutputConfig>
): BegendConfig {
  return { output: { ...config.output, ...overrides } };
}
