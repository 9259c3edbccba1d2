/**
 * sigil CLI configuration file support.
 *
 * Reads and writes `sigil.config.json`. Uses only Node built-in `fs` and
 * `path`.
 *
 * @packageDocumentation
 */

import { readFileSync, writeFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';

import { ConfigError, isOneOf, isPlainObject } from '@sigil/types';

// ─── Types ────────────────────────────────────────────────────────────────────

export const ENCODINGS = ['hex', 'bech32', 'both'] as const;
export const OUTPUT_FORMATS = ['text', 'json'] as const;
export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;

/** Which key encodings `generate` prints. */
export type KeyEncoding = (typeof ENCODINGS)[number];
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

/** Shape of a `sigil.config.json` configuration file. */
export interface SigilConfig {
  /** Default encoding for `generate`. */
  encoding?: KeyEncoding;
  /** Default output format for all commands. */
  outputFormat?: OutputFormat;
  /** Set to `false` to disable ANSI colors. */
  color?: boolean;
  logLevel?: LogLevelName;
}

/** A loaded config together with the file it came from. */
export interface LoadedConfig {
  path: string;
  config: SigilConfig;
}

/** Name of the configuration file. */
export const CONFIG_FILE_NAME = 'sigil.config.json';

// ─── Validation ───────────────────────────────────────────────────────────────

function invalidField(filePath: string, field: string, expected: string): ConfigError {
  return new ConfigError(`Invalid "${field}" in ${filePath}: expected ${expected}`, {
    context: { path: filePath, field },
  });
}

/**
 * Check a parsed JSON value against the {@link SigilConfig} shape.
 * Unknown fields are ignored.
 *
 * @throws {ConfigError} When the value is not an object or a known field has the wrong type.
 */
export function validateConfig(value: unknown, filePath: string): SigilConfig {
  if (!isPlainObject(value)) {
    throw new ConfigError(`${filePath} must contain a JSON object`, { context: { path: filePath } });
  }

  const config: SigilConfig = {};
  const { encoding, outputFormat, color, logLevel } = value;

  if (encoding !== undefined) {
    if (!isOneOf(encoding, ENCODINGS)) throw invalidField(filePath, 'encoding', ENCODINGS.join(', '));
    config.encoding = encoding;
  }
  if (outputFormat !== undefined) {
    if (!isOneOf(outputFormat, OUTPUT_FORMATS)) {
      throw invalidField(filePath, 'outputFormat', OUTPUT_FORMATS.join(', '));
    }
    config.outputFormat = outputFormat;
  }
  if (color !== undefined) {
    if (typeof color !== 'boolean') throw invalidField(filePath, 'color', 'true or false');
    config.color = color;
  }
  if (logLevel !== undefined) {
    if (!isOneOf(logLevel, LOG_LEVEL_NAMES)) {
      throw invalidField(filePath, 'logLevel', LOG_LEVEL_NAMES.join(', '));
    }
    config.logLevel = logLevel;
  }

  return config;
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Search for a `sigil.config.json` starting from `cwd` and walking up to the
 * filesystem root. Returns the absolute path if found, or `undefined`.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');

  for (;;) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = resolve(dir, '..');
    if (parent === dir) break;
    dir = parent;
  }

  return undefined;
}

/**
 * Load the nearest `sigil.config.json` above `cwd`.
 * Returns `undefined` if no config file is found.
 *
 * @throws {ConfigError} When the file cannot be read, is not JSON, or has invalid fields.
 */
export function loadConfig(cwd?: string): LoadedConfig | undefined {
  const filePath = findConfigFile(cwd);
  if (!filePath) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (cause) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    throw new ConfigError(`Could not read ${filePath}: ${reason}`, {
      cause,
      context: { path: filePath },
      hint: `Fix or delete ${CONFIG_FILE_NAME}.`,
    });
  }

  return { path: filePath, config: validateConfig(parsed, filePath) };
}

/**
 * Write a `sigil.config.json` to the given directory (defaults to cwd).
 * Overwrites any existing config file at that location.
 *
 * @returns The path written.
 */
export function saveConfig(config: SigilConfig, cwd?: string): string {
  const filePath = join(resolve(cwd ?? '.'), CONFIG_FILE_NAME);
  writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  return filePath;
}
