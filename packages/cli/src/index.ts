/**
 * sigil command line: generate, inspect and check secp256k1 key pairs.
 *
 * {@link run} executes one command against in-memory output buffers and
 * never touches `process`, so it can be tested directly. `main.ts` binds it
 * to the real process.
 *
 * @packageDocumentation
 */

import * as fs from 'fs/promises';
import * as path from 'path';

import {
  generateKeyPair,
  isPublicKeyEncoding,
  parseKeyPair,
  parsePublicKey,
  systemEntropy,
  toBech32,
  toHex,
  toNostrUri,
} from '@sigil/keys';
import type { EntropySource, KeyPair, PublicKey } from '@sigil/keys';

import {
  LogLevel,
  SIGIL_VERSION,
  SigilError,
  UsageError,
  createLogger,
  formatError,
  isOneOf,
  parseLogLevel,
} from '@sigil/types';
import type { Logger } from '@sigil/types';

import { ENCODINGS, loadConfig } from './config';
import type { KeyEncoding, LoadedConfig } from './config';
import { runDoctor } from './doctor';
import {
  error as formatErrorLine,
  green,
  header,
  keyValue,
  red,
  setColorsEnabled,
  success,
  table,
  warning,
  yellow,
} from './format';

export { runDoctor } from './doctor';
export type { DoctorCheck, DoctorOptions } from './doctor';
export { loadConfig, saveConfig, findConfigFile, validateConfig, CONFIG_FILE_NAME } from './config';
export type { SigilConfig, LoadedConfig, KeyEncoding, OutputFormat, LogLevelName } from './config';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Outcome of one CLI invocation. */
export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Environment a command runs in. Every field defaults to the real one. */
export interface RunOptions {
  /** Working directory for config lookup and relative `--out` paths. */
  cwd?: string;
  entropy?: EntropySource;
  /** Clock for key file timestamps. */
  now?: () => Date;
  /** Whether colors are allowed at all (e.g. stdout is a TTY). */
  color?: boolean;
}

// ─── Minimal argument parser ──────────────────────────────────────────────────

interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string | boolean>;
}

/** Flags that never take a value. */
const BOOLEAN_FLAGS = new Set(['json', 'no-color', 'show-secret', 'public', 'help', 'version']);

function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  let command = '';

  let i = 0;
  while (i < args.length) {
    const arg = args[i] ?? '';

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i += 2;
      } else {
        flags[key] = true;
        i += 1;
      }
    } else if (command === '') {
      command = arg;
      i += 1;
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { command, positional, flags };
}

function getFlag(flags: Record<string, string | boolean>, key: string): string | undefined {
  const val = flags[key];
  if (val === undefined) return undefined;
  if (typeof val === 'boolean') {
    throw new UsageError(`Option --${key} requires a value`);
  }
  return val;
}

// ─── Output context ───────────────────────────────────────────────────────────

interface Context {
  parsed: ParsedArgs;
  json: boolean;
  encoding: KeyEncoding;
  cwd: string;
  entropy: EntropySource;
  now: () => Date;
  log: Logger;
  out: (line: string) => void;
}

function resolveEncoding(flag: string | undefined, loaded: LoadedConfig | undefined): KeyEncoding {
  if (flag === undefined) return loaded?.config.encoding ?? 'both';
  if (!isOneOf(flag, ENCODINGS)) {
    throw new UsageError(`Invalid --encoding "${flag}": expected hex, bech32 or both`);
  }
  return flag;
}

function resolveLogLevel(flag: string | undefined, loaded: LoadedConfig | undefined): LogLevel {
  const name = flag ?? loaded?.config.logLevel;
  if (name === undefined) return LogLevel.WARN;
  const level = parseLogLevel(name);
  if (level === undefined) {
    throw new UsageError(`Invalid --log-level "${name}": expected debug, info, warn, error or silent`);
  }
  return level;
}

function json(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/** The public and secret fields a key pair prints under the given encoding. */
function keyFields(keyPair: KeyPair, encoding: KeyEncoding, includeSecret: boolean): [string, string][] {
  const fields: [string, string][] = [];
  const hex = encoding !== 'bech32';
  const bech32 = encoding !== 'hex';

  if (hex) fields.push(['publicKey', toHex(keyPair.publicKey)]);
  if (bech32) fields.push(['npub', toBech32(keyPair.publicKey)]);
  if (includeSecret) {
    if (hex) fields.push(['secretKey', toHex(keyPair.secretKey)]);
    if (bech32) fields.push(['nsec', toBech32(keyPair.secretKey)]);
  }
  return fields;
}

function publicFields(publicKey: PublicKey): [string, string][] {
  return [
    ['publicKey', toHex(publicKey)],
    ['npub', toBech32(publicKey)],
    ['uri', toNostrUri(publicKey)],
  ];
}

// ─── Command: generate ────────────────────────────────────────────────────────

async function cmdGenerate(ctx: Context): Promise<number> {
  const outFile = getFlag(ctx.parsed.flags, 'out');
  const keyPair = generateKeyPair(ctx.entropy);
  ctx.log.info('key pair generated', { npub: toBech32(keyPair.publicKey) });

  if (outFile === undefined) {
    const fields = keyFields(keyPair, ctx.encoding, true);
    if (ctx.json) {
      ctx.out(json(Object.fromEntries(fields)));
      return 0;
    }
    ctx.out(header('New key pair'));
    ctx.out(keyValue(fields));
    ctx.out('');
    ctx.out(warning('Keep the secret key private. Anyone who has it controls this identity.'));
    return 0;
  }

  const filePath = path.resolve(ctx.cwd, outFile);
  const keyFile = {
    secretKey: toBech32(keyPair.secretKey),
    publicKey: toBech32(keyPair.publicKey),
    createdAt: ctx.now().toISOString(),
  };
  try {
    await fs.writeFile(filePath, json(keyFile) + '\n', { encoding: 'utf-8', flag: 'wx', mode: 0o600 });
  } catch (cause) {
    if (cause instanceof Error && 'code' in cause && cause.code === 'EEXIST') {
      throw new UsageError(`Refusing to overwrite existing file ${filePath}`, {
        cause,
        hint: 'Choose another --out path or move the existing key file first.',
      });
    }
    throw cause;
  }
  ctx.log.info('key file written', { path: filePath });

  const fields = keyFields(keyPair, ctx.encoding, false);
  if (ctx.json) {
    ctx.out(json({ file: filePath, ...Object.fromEntries(fields) }));
    return 0;
  }
  ctx.out(success(`Key file written to ${filePath}`));
  ctx.out(keyValue(fields));
  return 0;
}

// ─── Command: inspect ─────────────────────────────────────────────────────────

function cmdInspect(ctx: Context): number {
  const input = ctx.parsed.positional[0];
  if (input === undefined) {
    throw new UsageError('Missing key argument. Usage: sigil inspect <key>');
  }
  const showSecret = ctx.parsed.flags['show-secret'] === true;

  if (ctx.parsed.flags['public'] === true || isPublicKeyEncoding(input)) {
    const publicKey = parsePublicKey(input);
    const fields: [string, string][] = [['kind', 'public-key'], ...publicFields(publicKey)];
    ctx.out(ctx.json ? json(Object.fromEntries(fields)) : keyValue(fields));
    return 0;
  }

  const keyPair = parseKeyPair(input);
  const fields: [string, string][] = [['kind', 'secret-key'], ...publicFields(keyPair.publicKey)];
  if (showSecret) {
    fields.push(['secretKey', toHex(keyPair.secretKey)], ['nsec', toBech32(keyPair.secretKey)]);
  }

  if (ctx.json) {
    ctx.out(json(Object.fromEntries(fields)));
    return 0;
  }
  ctx.out(keyValue(fields));
  if (!showSecret) {
    ctx.out('');
    ctx.out('Secret key hidden. Pass --show-secret to print it.');
  }
  return 0;
}

// ─── Command: doctor ──────────────────────────────────────────────────────────

function cmdDoctor(ctx: Context): number {
  const checks = runDoctor({ configDir: ctx.cwd, entropy: ctx.entropy });
  const ok = checks.every((c) => c.status !== 'fail');

  if (ctx.json) {
    ctx.out(json({ ok, checks }));
    return ok ? 0 : 1;
  }

  const paint = { ok: green, warn: yellow, fail: red } as const;
  ctx.out(
    table(
      ['Check', 'Status', 'Details'],
      checks.map((c) => [c.name, paint[c.status](c.status), c.message]),
    ),
  );
  ctx.out('');
  ctx.out(ok ? success('All checks passed') : formatErrorLine('Some checks failed'));
  return ok ? 0 : 1;
}

// ─── Command: help ────────────────────────────────────────────────────────────

const HELP = `sigil - secp256k1 key pair tool

Usage: sigil <command> [options]

Commands:
  generate                      Generate a new key pair
    --out <file>                  Write a key file instead of printing the secret key
  inspect <key>                 Show the kind, hex and bech32 forms of a key
    --show-secret                 Also print the secret key
    --public                      Read 64 hex characters as a public key
  doctor                        Check that keys can be generated and parsed
  help                          Show this help message
  version                       Show version information

Options:
  --json                        Print JSON
  --no-color                    Disable colors
  --encoding <hex|bech32|both>  Key encodings to print (default: both)
  --log-level <level>           debug, info, warn, error or silent (default: warn)`;

// ─── Entry point ──────────────────────────────────────────────────────────────

/**
 * Run one CLI command.
 *
 * @example
 * ```typescript
 * const { exitCode, stdout } = await run(['inspect', 'npub1…', '--json']);
 * ```
 */
export async function run(args: string[], options: RunOptions = {}): Promise<RunResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const parsed = parseArgs(args);
  const cwd = options.cwd ?? process.cwd();

  const log = createLogger({
    level: LogLevel.WARN,
    component: 'cli',
    output: (entry) => stderr.push(JSON.stringify(entry)),
  });

  let jsonOutput = parsed.flags['json'] === true;
  setColorsEnabled(options.color !== false && parsed.flags['no-color'] !== true && !jsonOutput);

  const finish = (exitCode: number): RunResult => ({
    exitCode,
    stdout: stdout.length > 0 ? stdout.join('\n') + '\n' : '',
    stderr: stderr.length > 0 ? stderr.join('\n') + '\n' : '',
  });

  try {
    const loaded = loadConfig(cwd);
    log.setLevel(resolveLogLevel(getFlag(parsed.flags, 'log-level'), loaded));
    if (loaded) {
      log.child('config').debug('config loaded', { path: loaded.path });
      jsonOutput = jsonOutput || loaded.config.outputFormat === 'json';
      if (loaded.config.color === false || jsonOutput) setColorsEnabled(false);
    }

    const ctx: Context = {
      parsed,
      json: jsonOutput,
      encoding: resolveEncoding(getFlag(parsed.flags, 'encoding'), loaded),
      cwd,
      entropy: options.entropy ?? systemEntropy,
      now: options.now ?? (() => new Date()),
      log,
      out: (line) => stdout.push(line),
    };

    if (!parsed.command || parsed.command === 'help' || parsed.flags['help'] === true) {
      ctx.out(HELP);
      return finish(0);
    }

    if (parsed.command === 'version' || parsed.flags['version'] === true) {
      ctx.out(jsonOutput ? JSON.stringify({ version: SIGIL_VERSION }) : `sigil v${SIGIL_VERSION}`);
      return finish(0);
    }

    switch (parsed.command) {
      case 'generate':
        return finish(await cmdGenerate(ctx));
      case 'inspect':
        return finish(cmdInspect(ctx));
      case 'doctor':
        return finish(cmdDoctor(ctx));
      default:
        throw new UsageError(`Unknown command: '${parsed.command}'. Run 'sigil help' for usage.`);
    }
  } catch (err) {
    if (err instanceof SigilError) {
      log.debug('command failed', { error: err.toJSON() });
      stderr.push(jsonOutput ? JSON.stringify({ error: err.toJSON() }) : formatErrorLine(formatError(err)));
      return finish(1);
    }
    const message = err instanceof Error ? err.message : String(err);
    stderr.push(jsonOutput ? JSON.stringify({ error: { message } }) : formatErrorLine(message));
    return finish(1);
  }
}
