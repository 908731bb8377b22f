import { performance } from 'node:perf_hooks';
import { ForceTable } from './force-table.ts';
import {
  DEFAULT_SOURCE_EXTENSION,
  formatUtcSeconds,
  summarizeProjectBundle,
  type ProjectBundle,
  type ProjectBundlePayload,
  type ProjectSummary,
} from './project-bundle.ts';

export type RuntimeLifecycleState = 'STOP' | 'RUN' | 'ERROR';

export const RUNTIME_CAPABILITIES = [
  'PING',
  'GET_STATUS',
  'START',
  'STOP',
  'GET_DIAG',
  'READ_VARS',
  'SET_VARS',
  'FORCE_SET',
  'FORCE_CLEAR',
  'GET_FORCES',
  'LOAD_PROJECT',
  'SHUTDOWN',
] as const;

export type RuntimeCommandName = (typeof RUNTIME_CAPABILITIES)[number];

export const DEFAULT_NOMINAL_SCAN_MS = 10;

/**
 * A request the runtime refused. The message is returned to the peer as-is.
 */
export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

export interface LocalSimRuntimeOptions {
  nominalScanMs?: number;
  sourceExtension?: string;
  monotonicNowMs?: () => number;
  wallClockNow?: () => Date;
}

export interface RuntimeStatus {
  runtime_state: RuntimeLifecycleState;
  last_error: string;
  effective_scan_ms: number;
  round_time_ms: number;
  uptime_ms: number;
  project_loaded: boolean;
  project_info: ProjectSummary | Record<string, never>;
}

/**
 * Process-wide simulated PLC state shared by every connection. All methods are
 * synchronous so a handler can never be interleaved with another connection's.
 */
export class LocalSimRuntime {
  readonly forces = new ForceTable();
  private readonly vars = new Map<string, unknown>();
  private readonly monotonicNowMs: () => number;
  private readonly wallClockNow: () => Date;
  private readonly startedAtMs: number;
  private readonly sourceExtension: string;
  private state: RuntimeLifecycleState = 'STOP';
  private lastError = '';
  private readonly effectiveScanMs: number;
  private readonly roundTimeMs = 0;
  private bundle: ProjectBundle | null = null;
  private summary: ProjectSummary | null = null;

  constructor(options: LocalSimRuntimeOptions = {}) {
    this.monotonicNowMs = options.monotonicNowMs ?? (() => performance.now());
    this.wallClockNow = options.wallClockNow ?? (() => new Date());
    this.effectiveScanMs = options.nominalScanMs ?? DEFAULT_NOMINAL_SCAN_MS;
    this.sourceExtension = options.sourceExtension ?? DEFAULT_SOURCE_EXTENSION;
    this.startedAtMs = this.monotonicNowMs();
  }

  lifecycleState(): RuntimeLifecycleState {
    return this.state;
  }

  projectLoaded(): boolean {
    return this.bundle !== null;
  }

  loadedBundle(): ProjectBundle | null {
    return this.bundle;
  }

  uptimeMs(): number {
    return Math.max(0, Math.floor(this.monotonicNowMs() - this.startedAtMs));
  }

  ping(): Record<string, unknown> {
    return {
      resp: 'PONG',
      runtime_state: this.state,
      uptime_ms: this.uptimeMs(),
      project_loaded: this.projectLoaded(),
      caps: [...RUNTIME_CAPABILITIES],
    };
  }

  status(): RuntimeStatus {
    return {
      runtime_state: this.state,
      last_error: this.lastError,
      effective_scan_ms: this.effectiveScanMs,
      round_time_ms: this.roundTimeMs,
      uptime_ms: this.uptimeMs(),
      project_loaded: this.projectLoaded(),
      project_info: this.summary ?? {},
    };
  }

  diagnostics(): Record<string, unknown> {
    return {
      runtime_state: this.state,
      round_time_ms: this.roundTimeMs,
      effective_scan_ms: this.effectiveScanMs,
      boards: [],
    };
  }

  start(): RuntimeLifecycleState {
    if (this.state === 'ERROR') {
      throw new CommandError('Runtime in ERROR: STOP then clear error');
    }
    if (!this.projectLoaded()) {
      throw new CommandError('No project loaded. Use LOAD_PROJECT first.');
    }
    this.state = 'RUN';
    return this.state;
  }

  // Leaves any state, ERROR included; last_error is kept for GET_STATUS.
  stop(): RuntimeLifecycleState {
    this.state = 'STOP';
    return this.state;
  }

  fault(message: string): void {
    this.state = 'ERROR';
    this.lastError = message;
  }

  // fromEntries defines own keys, so a variable named "__proto__" reads back like any other.
  readVars(names: readonly string[]): Record<string, unknown> {
    return Object.fromEntries(
      names.map((name): [string, unknown] => {
        const forced = this.forces.lookup(name);
        if (forced.forced) {
          return [name, forced.value];
        }
        return [name, this.vars.has(name) ? this.vars.get(name) : null];
      }),
    );
  }

  setVars(values: Readonly<Record<string, unknown>>): number {
    const entries = Object.entries(values);
    for (const [name, value] of entries) {
      this.vars.set(name, value);
    }
    return entries.length;
  }

  loadProject(payload: ProjectBundlePayload): ProjectSummary {
    const receivedUtc = formatUtcSeconds(this.wallClockNow());
    const summary = summarizeProjectBundle(payload, {
      sourceExtension: this.sourceExtension,
      receivedUtc,
    });
    this.bundle = {
      ...payload,
      received_utc: receivedUtc,
    };
    this.summary = summary;
    this.state = 'STOP';
    return summary;
  }
}
