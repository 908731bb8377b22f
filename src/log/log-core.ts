import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

type LogAttrValue = boolean | number | string | null;
type LogAttrs = Readonly<Record<string, LogAttrValue>>;

export interface LogSink {
  write(line: string): void;
}

interface LogCoreConfig {
  level: LogLevel;
  filePath?: string | null;
  stdout?: LogSink;
  stderr?: LogSink;
}

interface LogFileRecord {
  ts: string;
  level: LogLevel;
  name: string;
  'duration-ms'?: number;
  attrs?: LogAttrs;
}

const LOG_TAG = '[localsim]';
const DEFAULT_MAX_PENDING_RECORDS = 4096;

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const state: {
  level: LogLevel;
  filePath: string | null;
  fd: number | null;
  flushTimer: NodeJS.Timeout | null;
  pendingRecords: string[];
  stdout: LogSink;
  stderr: LogSink;
} = {
  level: 'info',
  filePath: null,
  fd: null,
  flushTimer: null,
  pendingRecords: [],
  stdout: process.stdout,
  stderr: process.stderr,
};

export function parseLogLevel(value: unknown): LogLevel | null {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'warning') {
    return 'warn';
  }
  return LOG_LEVELS.find((level) => level === normalized) ?? null;
}

function ensureWriter(): void {
  if (state.filePath === null || state.fd !== null) {
    return;
  }
  const resolvedPath = resolve(state.filePath);
  mkdirSync(dirname(resolvedPath), { recursive: true });
  state.fd = openSync(resolvedPath, 'a');
}

function flushPendingRecords(): void {
  if (state.fd === null || state.pendingRecords.length === 0) {
    return;
  }
  const chunk = state.pendingRecords.join('');
  state.pendingRecords.length = 0;
  writeSync(state.fd, chunk);
}

function closeWriter(): void {
  flushPendingRecords();
  if (state.flushTimer !== null) {
    clearTimeout(state.flushTimer);
    state.flushTimer = null;
  }
  if (state.fd === null) {
    return;
  }
  closeSync(state.fd);
  state.fd = null;
}

function scheduleFlush(): void {
  if (state.fd === null || state.flushTimer !== null) {
    return;
  }
  state.flushTimer = setTimeout(() => {
    state.flushTimer = null;
    flushPendingRecords();
  }, 0);
  state.flushTimer.unref();
}

function writeFileRecord(record: LogFileRecord): void {
  ensureWriter();
  if (state.fd === null) {
    return;
  }
  if (state.pendingRecords.length >= DEFAULT_MAX_PENDING_RECORDS) {
    state.pendingRecords.shift();
  }
  state.pendingRecords.push(`${JSON.stringify(record)}\n`);
  scheduleFlush();
}

function formatAttrValue(value: LogAttrValue): string {
  if (typeof value === 'string') {
    return /[\s"=]/.test(value) || value.length === 0 ? JSON.stringify(value) : value;
  }
  return String(value);
}

export function formatLogLine(
  ts: string,
  level: LogLevel,
  message: string,
  attrs?: LogAttrs,
): string {
  let line = `${ts} ${level.toUpperCase()} ${LOG_TAG} ${message}`;
  if (attrs !== undefined) {
    for (const [key, value] of Object.entries(attrs)) {
      line += ` ${key}=${formatAttrValue(value)}`;
    }
  }
  return `${line}\n`;
}

export function isLogLevelEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[state.level];
}

function emit(level: LogLevel, message: string, attrs?: LogAttrs, durationMs?: number): void {
  if (!isLogLevelEnabled(level)) {
    return;
  }
  const ts = new Date().toISOString();
  const lineAttrs =
    durationMs === undefined ? attrs : { ...attrs, 'duration-ms': durationMs };
  const sink = level === 'error' ? state.stderr : state.stdout;
  sink.write(formatLogLine(ts, level, message, lineAttrs));

  if (state.filePath === null) {
    return;
  }
  const record: LogFileRecord = {
    ts,
    level,
    name: message,
  };
  if (durationMs !== undefined) {
    record['duration-ms'] = durationMs;
  }
  if (attrs !== undefined) {
    record.attrs = attrs;
  }
  writeFileRecord(record);
}

export function configureLogCore(config: LogCoreConfig): void {
  const nextFilePath = config.filePath === undefined ? state.filePath : config.filePath;
  const pathChanged =
    (nextFilePath === null) !== (state.filePath === null) ||
    (nextFilePath !== null && state.filePath !== null && resolve(nextFilePath) !== resolve(state.filePath));
  if (pathChanged) {
    closeWriter();
  }

  state.level = config.level;
  state.filePath = nextFilePath;
  state.stdout = config.stdout ?? process.stdout;
  state.stderr = config.stderr ?? process.stderr;
}

export function logDebug(message: string, attrs?: LogAttrs): void {
  emit('debug', message, attrs);
}

export function logInfo(message: string, attrs?: LogAttrs): void {
  emit('info', message, attrs);
}

export function logWarn(message: string, attrs?: LogAttrs): void {
  emit('warn', message, attrs);
}

export function logError(message: string, attrs?: LogAttrs): void {
  emit('error', message, attrs);
}

interface LogSpan {
  end(extraAttrs?: LogAttrs): void;
}

const NOOP_LOG_SPAN: LogSpan = {
  end(): void {
    return;
  },
};

/**
 * Debug-level timing of one unit of work, logged once on `end()`.
 */
export function startLogSpan(name: string, attrs?: LogAttrs): LogSpan {
  if (!isLogLevelEnabled('debug')) {
    return NOOP_LOG_SPAN;
  }
  const startedAtNs = process.hrtime.bigint();
  let ended = false;
  return {
    end(extraAttrs?: LogAttrs): void {
      if (ended) {
        return;
      }
      ended = true;
      const durationMs = Number(process.hrtime.bigint() - startedAtNs) / 1_000_000;
      emit('debug', name, { ...attrs, ...extraAttrs }, Math.round(durationMs * 1000) / 1000);
    },
  };
}

export function shutdownLogCore(): void {
  closeWriter();
}
