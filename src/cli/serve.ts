import {
  applyLocalSimEnvOverrides,
  loadLocalSimConfig,
  type LocalSimConfig,
} from '../config/config-core.ts';
import { LocalSimRuntimeServer } from '../control-plane/runtime-server.ts';
import {
  configureLogCore,
  logError,
  logInfo,
  logWarn,
  shutdownLogCore,
  type LogLevel,
  type LogSink,
} from '../log/log-core.ts';
import { LocalSimRuntime } from '../runtime/runtime-state.ts';

export const SERVE_EXIT_OK = 0;
export const SERVE_EXIT_STARTUP_FAILED = 1;
export const SERVE_EXIT_BIND_FAILED = 2;

type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export interface ServeOptions {
  host?: string;
  port?: number;
  logLevel?: LogLevel;
  logFile?: string;
  configPath?: string;
  cwd?: string;
  env?: Readonly<Record<string, string | undefined>>;
  stdout?: LogSink;
  stderr?: LogSink;
  // Invoked once the listener is bound; tests use it to learn the ephemeral port.
  onListening?: (server: LocalSimRuntimeServer) => void;
  signals?: readonly ShutdownSignal[];
}

export function resolveServeConfig(options: ServeOptions): {
  config: LocalSimConfig;
  configError: string | null;
} {
  const loaded = loadLocalSimConfig({
    ...(options.cwd === undefined ? {} : { cwd: options.cwd }),
    ...(options.configPath === undefined ? {} : { filePath: options.configPath }),
  });
  const withEnv = applyLocalSimEnvOverrides(loaded.config, options.env ?? process.env);
  return {
    config: {
      server: {
        ...withEnv.server,
        host: options.host ?? withEnv.server.host,
        port: options.port ?? withEnv.server.port,
      },
      runtime: withEnv.runtime,
      log: {
        level: options.logLevel ?? withEnv.log.level,
        filePath: options.logFile ?? withEnv.log.filePath,
      },
    },
    configError: loaded.error,
  };
}

function isBindError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  const code = error.code;
  return code === 'EADDRINUSE' || code === 'EADDRNOTAVAIL' || code === 'EACCES';
}

/**
 * Runs the runtime server in the foreground until a SHUTDOWN command has been
 * served and every client has gone, or until the process is signalled.
 */
export async function runServe(options: ServeOptions = {}): Promise<number> {
  const { config, configError } = resolveServeConfig(options);
  configureLogCore({
    level: config.log.level,
    filePath: config.log.filePath,
    ...(options.stdout === undefined ? {} : { stdout: options.stdout }),
    ...(options.stderr === undefined ? {} : { stderr: options.stderr }),
  });
  if (configError !== null) {
    logWarn('config load failed; using defaults', {
      message: configError,
    });
  }

  const server = new LocalSimRuntimeServer({
    host: config.server.host,
    port: config.server.port,
    maxFrameBytes: config.server.maxFrameBytes,
    runtime: new LocalSimRuntime({
      nominalScanMs: config.runtime.nominalScanMs,
      sourceExtension: config.runtime.sourceExtension,
    }),
  });

  try {
    await server.start();
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    const bindFailed = isBindError(error);
    logError(bindFailed ? 'failed to bind runtime listener' : 'runtime startup failed', {
      host: config.server.host,
      port: config.server.port,
      message,
    });
    shutdownLogCore();
    return bindFailed ? SERVE_EXIT_BIND_FAILED : SERVE_EXIT_STARTUP_FAILED;
  }

  options.onListening?.(server);

  const signals = options.signals ?? ['SIGINT', 'SIGTERM'];
  let signalled = false;
  let stopping: Promise<void> = Promise.resolve();
  const onSignal = (signal: ShutdownSignal): void => {
    if (signalled) {
      return;
    }
    signalled = true;
    logInfo('signal received', { signal });
    stopping = server.close();
  };
  for (const signal of signals) {
    process.on(signal, onSignal);
  }

  try {
    await server.waitForClose();
    await stopping;
  } finally {
    for (const signal of signals) {
      process.off(signal, onSignal);
    }
  }

  logInfo('runtime stopped', {
    shutdownRequested: server.isShutdownRequested(),
  });
  shutdownLogCore();
  return SERVE_EXIT_OK;
}
