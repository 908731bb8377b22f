import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { DEFAULT_MAX_FRAME_BYTES } from '../control-plane/frame-protocol.ts';
import { parseLogLevel, type LogLevel } from '../log/log-core.ts';
import { DEFAULT_SOURCE_EXTENSION } from '../runtime/project-bundle.ts';
import { DEFAULT_NOMINAL_SCAN_MS } from '../runtime/runtime-state.ts';

export const LOCALSIM_CONFIG_FILE_NAME = 'localsim.config.jsonc';
export const DEFAULT_LOCALSIM_HOST = '127.0.0.1';
export const DEFAULT_LOCALSIM_PORT = 1963;

interface LocalSimServerConfig {
  readonly host: string;
  readonly port: number;
  readonly maxFrameBytes: number;
}

interface LocalSimRuntimeConfig {
  readonly sourceExtension: string;
  readonly nominalScanMs: number;
}

interface LocalSimLogConfig {
  readonly level: LogLevel;
  readonly filePath: string | null;
}

export interface LocalSimConfig {
  readonly server: LocalSimServerConfig;
  readonly runtime: LocalSimRuntimeConfig;
  readonly log: LocalSimLogConfig;
}

interface LoadedLocalSimConfig {
  readonly filePath: string;
  readonly config: LocalSimConfig;
  readonly fromLastKnownGood: boolean;
  readonly error: string | null;
}

export const DEFAULT_LOCALSIM_CONFIG: LocalSimConfig = {
  server: {
    host: DEFAULT_LOCALSIM_HOST,
    port: DEFAULT_LOCALSIM_PORT,
    maxFrameBytes: DEFAULT_MAX_FRAME_BYTES,
  },
  runtime: {
    sourceExtension: DEFAULT_SOURCE_EXTENSION,
    nominalScanMs: DEFAULT_NOMINAL_SCAN_MS,
  },
  log: {
    level: 'info',
    filePath: null,
  },
};

function stripJsoncComments(text: string): string {
  let output = '';
  let inString = false;
  let inLineComment = false;
  let inBlockComment = false;
  let escaped = false;

  for (let idx = 0; idx < text.length; idx += 1) {
    const char = text[idx]!;
    const next = text[idx + 1] ?? '';

    if (inLineComment) {
      if (char === '\n') {
        inLineComment = false;
        output += char;
      }
      continue;
    }

    if (inBlockComment) {
      if (char === '*' && next === '/') {
        inBlockComment = false;
        idx += 1;
      }
      continue;
    }

    if (inString) {
      output += char;
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      output += char;
      continue;
    }

    if (char === '/' && (next === '/' || next === '*')) {
      inLineComment = next === '/';
      inBlockComment = next === '*';
      idx += 1;
      continue;
    }

    output += char;
  }

  return output;
}

function stripTrailingCommas(text: string): string {
  let output = '';
  let inString = false;
  let escaped = false;

  for (let idx = 0; idx < text.length; idx += 1) {
    const char = text[idx]!;
    if (inString) {
      output += char;
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      output += char;
      continue;
    }

    if (char === ',') {
      let lookahead = idx + 1;
      while (lookahead < text.length && /\s/.test(text[lookahead]!)) {
        lookahead += 1;
      }
      const closing = text[lookahead];
      if (closing === '}' || closing === ']') {
        continue;
      }
    }

    output += char;
  }

  return output;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

export function normalizePort(value: unknown, fallback: number): number {
  const parsed = typeof value === 'string' && value.trim().length > 0 ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    return fallback;
  }
  return parsed;
}

function normalizeHost(value: unknown, fallback: string): string {
  if (typeof value !== 'string') {
    return fallback;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? fallback : trimmed;
}

function normalizePositiveInt(value: unknown, fallback: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    return fallback;
  }
  return value;
}

function normalizeNonNegativeNumber(value: unknown, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    return fallback;
  }
  return value;
}

function normalizeSourceExtension(value: unknown, fallback: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return fallback;
  }
  const trimmed = value.trim();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

function normalizeServerConfig(input: unknown): LocalSimServerConfig {
  const record = asRecord(input);
  const defaults = DEFAULT_LOCALSIM_CONFIG.server;
  if (record === null) {
    return defaults;
  }
  return {
    host: normalizeHost(record['host'], defaults.host),
    port: normalizePort(record['port'], defaults.port),
    maxFrameBytes: normalizePositiveInt(record['maxFrameBytes'], defaults.maxFrameBytes),
  };
}

function normalizeRuntimeConfig(input: unknown): LocalSimRuntimeConfig {
  const record = asRecord(input);
  const defaults = DEFAULT_LOCALSIM_CONFIG.runtime;
  if (record === null) {
    return defaults;
  }
  return {
    sourceExtension: normalizeSourceExtension(record['sourceExtension'], defaults.sourceExtension),
    nominalScanMs: normalizeNonNegativeNumber(record['nominalScanMs'], defaults.nominalScanMs),
  };
}

function normalizeLogConfig(input: unknown): LocalSimLogConfig {
  const record = asRecord(input);
  const defaults = DEFAULT_LOCALSIM_CONFIG.log;
  if (record === null) {
    return defaults;
  }
  const filePath = record['filePath'];
  return {
    level: parseLogLevel(record['level']) ?? defaults.level,
    filePath: typeof filePath === 'string' && filePath.trim().length > 0 ? filePath : null,
  };
}

export function parseLocalSimConfigText(text: string): LocalSimConfig {
  const stripped = stripTrailingCommas(stripJsoncComments(text));
  const parsed = JSON.parse(stripped) as unknown;
  const root = asRecord(parsed);
  if (root === null) {
    return DEFAULT_LOCALSIM_CONFIG;
  }
  return {
    server: normalizeServerConfig(root['server']),
    runtime: normalizeRuntimeConfig(root['runtime']),
    log: normalizeLogConfig(root['log']),
  };
}

export function resolveLocalSimConfigPath(cwd: string): string {
  return resolve(cwd, LOCALSIM_CONFIG_FILE_NAME);
}

export function loadLocalSimConfig(options?: {
  cwd?: string;
  filePath?: string;
  lastKnownGood?: LocalSimConfig;
}): LoadedLocalSimConfig {
  const cwd = options?.cwd ?? process.cwd();
  const filePath = options?.filePath ?? resolveLocalSimConfigPath(cwd);
  const lastKnownGood = options?.lastKnownGood ?? DEFAULT_LOCALSIM_CONFIG;

  if (!existsSync(filePath)) {
    return {
      filePath,
      config: lastKnownGood,
      fromLastKnownGood: false,
      error: null,
    };
  }

  try {
    const raw = readFileSync(filePath, 'utf8');
    return {
      filePath,
      config: parseLocalSimConfigText(raw),
      fromLastKnownGood: false,
      error: null,
    };
  } catch (error: unknown) {
    return {
      filePath,
      config: lastKnownGood,
      fromLastKnownGood: true,
      error: String(error),
    };
  }
}

/**
 * Applies LOCALSIM_* environment overrides on top of a loaded config.
 */
export function applyLocalSimEnvOverrides(
  config: LocalSimConfig,
  env: Readonly<Record<string, string | undefined>>,
): LocalSimConfig {
  const logFile = env['LOCALSIM_LOG_FILE'];
  return {
    server: {
      ...config.server,
      host: normalizeHost(env['LOCALSIM_HOST'], config.server.host),
      port: normalizePort(env['LOCALSIM_PORT'], config.server.port),
    },
    runtime: config.runtime,
    log: {
      level: parseLogLevel(env['LOCALSIM_LOG_LEVEL']) ?? config.log.level,
      filePath:
        typeof logFile === 'string' && logFile.trim().length > 0 ? logFile : config.log.filePath,
    },
  };
}
