/**
 * Configuration Loader
 * Loads and validates .lua-bridge.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import {
  STANDARD_LIBRARIES,
  type StandardLibrary,
} from './runtime/core/types.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.lua-bridge.yaml';

const KNOWN_KEYS = new Set(['libraries', 'packagePath']);

// ============================================================
// TYPES
// ============================================================

export interface BridgeConfig {
  /** Libraries opened in new VMs */
  libraries: 'all' | StandardLibrary[];
  /** Assigned to package.path when set */
  packagePath: string | undefined;
}

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

/** Create default configuration: every library, default package.path */
export function createDefaultConfig(): BridgeConfig {
  return { libraries: 'all', packagePath: undefined };
}

// ============================================================
// VALIDATION
// ============================================================

function isStandardLibrary(value: unknown): value is StandardLibrary {
  return STANDARD_LIBRARIES.some((library) => library === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLibraries(value: unknown): 'all' | StandardLibrary[] {
  if (value === 'all') return 'all';
  if (!Array.isArray(value)) {
    throw new Error(
      "Invalid configuration: libraries must be 'all' or a list of library names"
    );
  }
  const libraries: StandardLibrary[] = [];
  for (const name of value) {
    if (!isStandardLibrary(name)) {
      throw new Error(`Invalid configuration: unknown library ${String(name)}`);
    }
    libraries.push(name);
  }
  return libraries;
}

/**
 * Validate parsed YAML and merge it over the defaults.
 * Throws Error if configuration is invalid.
 */
function toConfig(data: unknown): BridgeConfig {
  // An empty file has no document
  if (data === null || data === undefined) return createDefaultConfig();
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  const config = createDefaultConfig();
  if ('libraries' in data) {
    config.libraries = parseLibraries(data['libraries']);
  }
  if ('packagePath' in data) {
    const packagePath = data['packagePath'];
    if (typeof packagePath !== 'string') {
      throw new Error('Invalid configuration: packagePath must be a string');
    }
    config.packagePath = packagePath;
  }
  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .lua-bridge.yaml in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns configuration merged over the defaults, or null if file not found
 * @throws Error with "Invalid configuration: {reason}" if the file is invalid
 */
export function loadConfig(cwd: string): BridgeConfig | null {
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

  return toConfig(parsedData);
}
