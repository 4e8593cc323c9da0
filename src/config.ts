/**
 * Configuration Loader for the sylt CLI
 * Loads and validates .sylt.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.sylt.yaml';

/** 0: quiet, 1: bytecode listing, 2: listing plus instruction trace */
export type Verbosity = 0 | 1 | 2;

export interface SyltConfig {
  readonly verbosity: Verbosity;
  /** Run the typecheck pass before executing */
  readonly typecheck: boolean;
  /** File extension of modules, without the dot */
  readonly extension: string;
}

export const DEFAULT_CONFIG: SyltConfig = {
  verbosity: 0,
  typecheck: true,
  extension: 'sy',
};

// ============================================================
// VALIDATION
// ============================================================

function isVerbosity(value: unknown): value is Verbosity {
  return value === 0 || value === 1 || value === 2;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate configuration structure and merge it over the defaults.
 * Throws Error if configuration is invalid.
 */
export function parseConfig(data: unknown): SyltConfig {
  // An empty document parses to null
  if (data === null || data === undefined) return DEFAULT_CONFIG;
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  const known = new Set(Object.keys(DEFAULT_CONFIG));
  for (const key of Object.keys(data)) {
    if (!known.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  return {
    verbosity: readVerbosity(data['verbosity']),
    typecheck: readTypecheck(data['typecheck']),
    extension: readExtension(data['extension']),
  };
}

function readVerbosity(value: unknown): Verbosity {
  if (value === undefined) return DEFAULT_CONFIG.verbosity;
  if (!isVerbosity(value)) {
    throw new Error('Invalid configuration: verbosity must be 0, 1 or 2');
  }
  return value;
}

function readTypecheck(value: unknown): boolean {
  if (value === undefined) return DEFAULT_CONFIG.typecheck;
  if (typeof value !== 'boolean') {
    throw new Error('Invalid configuration: typecheck must be true or false');
  }
  return value;
}

function readExtension(value: unknown): string {
  if (value === undefined) return DEFAULT_CONFIG.extension;
  if (typeof value !== 'string' || !/^[A-Za-z0-9]+$/.test(value)) {
    throw new Error('Invalid configuration: extension must be letters and digits');
  }
  return value;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .sylt.yaml in the specified directory.
 *
 * @param dir - Directory to search for configuration file
 * @returns SyltConfig object, or null if file not found
 * @throws Error with "Invalid configuration: {reason}" if the file is malformed
 */
export function loadConfig(dir: string): SyltConfig | null {
  const configPath = join(dir, CONFIG_FILE_NAME);

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
    parsedData = parseYaml(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return parseConfig(parsedData);
}
