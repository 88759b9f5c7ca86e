/**
 * Configuration Loader
 * Loads and validates .skiff.yaml runtime configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import type { DiagnosticLimits } from './printer/abbreviated.js';
import type { RuntimeOptions } from './runtime/core/types.js';
import { SkiffTuple, type SkiffValue } from './runtime/core/values.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.skiff.yaml';

// ============================================================
// CONFIGURATION SHAPE
// ============================================================

/** Runtime options a configuration file can set */
export type SkiffConfig = Pick<
  RuntimeOptions,
  'timeout' | 'diagnostics' | 'variables'
>;

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function readDiagnostics(data: unknown): Partial<DiagnosticLimits> {
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: diagnostics must be a mapping');
  }

  const limits: { maxElements?: number; maxLength?: number } = {};
  for (const [key, value] of Object.entries(data)) {
    if (key !== 'maxElements' && key !== 'maxLength') {
      throw new Error(`Invalid configuration: unknown diagnostics key ${key}`);
    }
    if (!isPositiveInteger(value)) {
      throw new Error(
        `Invalid configuration: diagnostics.${key} must be a positive integer`
      );
    }
    limits[key] = value;
  }
  return limits;
}

/**
 * Convert a YAML value to a Skiff value. Sequences become tuples, so
 * configured values stay immutable however many scripts read them.
 */
function toSkiffValue(path: string, value: unknown): SkiffValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return SkiffTuple.copyOf(
      value.map((item: unknown, i) => toSkiffValue(`${path}[${i}]`, item))
    );
  }
  throw new Error(
    `Invalid configuration: ${path} must be a scalar or a sequence`
  );
}

function readVariables(data: unknown): Record<string, SkiffValue> {
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: variables must be a mapping');
  }

  const variables: Record<string, SkiffValue> = {};
  for (const [name, value] of Object.entries(data)) {
    variables[name] = toSkiffValue(`variables.${name}`, value);
  }
  return variables;
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
export function parseConfig(data: unknown): SkiffConfig {
  // An empty file parses to null
  if (data === null) return {};
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  const config: SkiffConfig = {};
  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case 'timeout':
        if (!isPositiveInteger(value)) {
          throw new Error(
            'Invalid configuration: timeout must be a positive integer'
          );
        }
        config.timeout = value;
        break;
      case 'diagnostics':
        config.diagnostics = readDiagnostics(value);
        break;
      case 'variables':
        config.variables = readVariables(value);
        break;
      default:
        throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }
  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .skiff.yaml in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns Configuration, or null if file not found
 * @throws Error with "Invalid configuration: {reason}" if the file is invalid
 */
export function loadConfig(cwd: string): SkiffConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  // Return null if file not found (not an error)
  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(parsedData);
}
