import { readFileSync } from 'node:fs';
import { applyLocalSimEnvOverrides, loadLocalSimConfig } from '../config/config-core.ts';
import { asRecord, type JsonObject } from '../control-plane/frame-protocol.ts';
import {
  connectLocalSimRuntimeClient,
  type LocalSimRuntimeClient,
} from '../control-plane/runtime-client.ts';
import type { LogSink } from '../log/log-core.ts';
import type { RuntimeCommandName } from '../runtime/runtime-state.ts';

export interface ControlTarget {
  host: string;
  port: number;
  connectRetryWindowMs?: number;
}

interface ControlIo {
  stdout: LogSink;
  stderr: LogSink;
}

const DEFAULT_IO: ControlIo = {
  stdout: process.stdout,
  stderr: process.stderr,
};

export function resolveControlTarget(options: {
  host?: string;
  port?: number;
  configPath?: string;
  env?: Readonly<Record<string, string | undefined>>;
}): ControlTarget {
  const loaded = loadLocalSimConfig(
    options.configPath === undefined ? {} : { filePath: options.configPath },
  );
  const config = applyLocalSimEnvOverrides(loaded.config, options.env ?? process.env);
  return {
    host: options.host ?? config.server.host,
    port: options.port ?? config.server.port,
  };
}

// Values that parse as JSON keep their type; anything else is sent as a string.
function parseAssignmentValue(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return raw;
  }
}

export function parseAssignments(args: readonly string[]): JsonObject {
  const values: JsonObject = {};
  for (const arg of args) {
    const separator = arg.indexOf('=');
    if (separator <= 0) {
      throw new Error(`invalid assignment: ${arg} (expected name=value)`);
    }
    values[arg.slice(0, separator)] = parseAssignmentValue(arg.slice(separator + 1));
  }
  return values;
}

export function readBundleFile(filePath: string): JsonObject {
  const parsed = JSON.parse(readFileSync(filePath, 'utf8')) as unknown;
  const bundle = asRecord(parsed);
  if (bundle === null) {
    throw new Error(`bundle file must contain a JSON object: ${filePath}`);
  }
  return bundle;
}

/**
 * Sends one command, prints the response envelope as JSON and maps `ok` to the
 * process exit code.
 */
export async function runControlCommand(
  target: ControlTarget,
  cmd: RuntimeCommandName,
  payload: JsonObject = {},
  io: ControlIo = DEFAULT_IO,
): Promise<number> {
  let client: LocalSimRuntimeClient;
  try {
    client = await connectLocalSimRuntimeClient({
      host: target.host,
      port: target.port,
      connectRetryWindowMs: target.connectRetryWindowMs ?? 0,
    });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`failed to connect to ${target.host}:${String(target.port)}: ${message}\n`);
    return 1;
  }

  try {
    const response = await client.sendCommand(cmd, payload);
    io.stdout.write(`${JSON.stringify(response, null, 2)}\n`);
    return response.ok ? 0 : 1;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${cmd} failed: ${message}\n`);
    return 1;
  } finally {
    client.close();
  }
}
