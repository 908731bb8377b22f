import { connect, type Socket } from 'node:net';
import {
  consumeFrames,
  encodeFrame,
  parseResponseEnvelope,
  UNCORRELATED_REQ_ID,
  type JsonObject,
  type RuntimeResponseEnvelope,
} from './frame-protocol.ts';
import type { RuntimeCommandName } from '../runtime/runtime-state.ts';
import { logDebug } from '../log/log-core.ts';

const MAX_REQ_ID = 2_000_000_000;

interface LocalSimRuntimeClientOptions {
  host: string;
  port: number;
  connectRetryWindowMs?: number;
  connectRetryDelayMs?: number;
}

interface PendingRequest {
  readonly cmd: string;
  resolve: (response: RuntimeResponseEnvelope) => void;
  reject: (error: Error) => void;
}

export class RuntimeCommandFailedError extends Error {
  readonly cmd: string;
  readonly reqId: number;

  constructor(cmd: string, response: RuntimeResponseEnvelope) {
    super(response.error);
    this.name = 'RuntimeCommandFailedError';
    this.cmd = cmd;
    this.reqId = response.req_id;
  }
}

/**
 * Pipelining client for one runtime connection. Responses arrive in request
 * order, so an uncorrelated (`req_id = -1`) error settles the oldest request.
 */
export class LocalSimRuntimeClient {
  private readonly socket: Socket;
  private readonly pending = new Map<number, PendingRequest>();
  private remainder: Buffer = Buffer.alloc(0);
  private lastReqId: number;
  private closed = false;

  constructor(socket: Socket, lastReqId = 0) {
    this.socket = socket;
    this.lastReqId = lastReqId;

    socket.on('data', (chunk: Buffer) => {
      this.handleData(chunk);
    });

    socket.on('close', () => {
      this.handleClose(new Error('runtime connection closed'));
    });

    socket.on('error', (error: Error) => {
      this.handleClose(error);
    });
  }

  isClosed(): boolean {
    return this.closed;
  }

  pendingCount(): number {
    return this.pending.size;
  }

  sendCommand(cmd: string, payload: JsonObject = {}): Promise<RuntimeResponseEnvelope> {
    return new Promise<RuntimeResponseEnvelope>((resolve, reject) => {
      if (this.closed) {
        reject(new Error('runtime connection is closed'));
        return;
      }
      const reqId = this.nextReqId();
      this.pending.set(reqId, {
        cmd,
        resolve,
        reject,
      });
      logDebug('client request sent', {
        cmd,
        reqId,
      });
      this.socket.write(
        encodeFrame({
          cmd,
          req_id: reqId,
          payload,
        }),
      );
    });
  }

  /**
   * Sends a command and resolves with its payload; an `ok: false` response
   * rejects with `RuntimeCommandFailedError`.
   */
  async call(cmd: RuntimeCommandName, payload: JsonObject = {}): Promise<JsonObject> {
    const response = await this.sendCommand(cmd, payload);
    if (!response.ok) {
      throw new RuntimeCommandFailedError(cmd, response);
    }
    return response.payload;
  }

  ping(): Promise<JsonObject> {
    return this.call('PING');
  }

  status(): Promise<JsonObject> {
    return this.call('GET_STATUS');
  }

  start(): Promise<JsonObject> {
    return this.call('START');
  }

  stop(): Promise<JsonObject> {
    return this.call('STOP');
  }

  diagnostics(): Promise<JsonObject> {
    return this.call('GET_DIAG');
  }

  readVars(names: readonly string[]): Promise<JsonObject> {
    return this.call('READ_VARS', { names: [...names] });
  }

  setVars(values: Readonly<Record<string, unknown>>): Promise<JsonObject> {
    return this.call('SET_VARS', { values: { ...values } });
  }

  forceSet(ownerId: string, values: Readonly<Record<string, unknown>>): Promise<JsonObject> {
    return this.call('FORCE_SET', { owner_id: ownerId, values: { ...values } });
  }

  forceClear(
    ownerId: string,
    options: { names?: readonly string[]; all?: boolean } = {},
  ): Promise<JsonObject> {
    const payload: JsonObject = { owner_id: ownerId };
    if (options.names !== undefined) {
      payload['names'] = [...options.names];
    }
    if (options.all !== undefined) {
      payload['all'] = options.all;
    }
    return this.call('FORCE_CLEAR', payload);
  }

  forces(): Promise<JsonObject> {
    return this.call('GET_FORCES');
  }

  loadProject(bundle: JsonObject): Promise<JsonObject> {
    return this.call('LOAD_PROJECT', bundle);
  }

  shutdown(): Promise<JsonObject> {
    return this.call('SHUTDOWN');
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.socket.end();
    this.rejectPending(new Error('runtime connection closed'));
  }

  private nextReqId(): number {
    this.lastReqId += 1;
    if (this.lastReqId > MAX_REQ_ID) {
      this.lastReqId = 1;
    }
    return this.lastReqId;
  }

  private handleData(chunk: Buffer): void {
    const consumed = consumeFrames(Buffer.concat([this.remainder, chunk]));
    this.remainder = consumed.remainder;

    for (const frame of consumed.frames) {
      if (frame.kind !== 'message') {
        continue;
      }
      const response = parseResponseEnvelope(frame.message);
      if (response === null) {
        continue;
      }
      this.settle(response);
    }

    if (consumed.error !== null) {
      this.socket.destroy(consumed.error);
    }
  }

  private settle(response: RuntimeResponseEnvelope): void {
    let reqId = response.req_id;
    if (reqId === UNCORRELATED_REQ_ID) {
      const oldest = this.pending.keys().next();
      if (oldest.done === true) {
        return;
      }
      reqId = oldest.value;
    }
    const pending = this.pending.get(reqId);
    if (pending === undefined) {
      return;
    }
    this.pending.delete(reqId);
    logDebug('client response received', {
      cmd: pending.cmd,
      reqId,
      ok: response.ok,
    });
    pending.resolve(response);
  }

  private handleClose(error: Error): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.rejectPending(error);
  }

  private rejectPending(error: Error): void {
    for (const pending of this.pending.values()) {
      pending.reject(error);
    }
    this.pending.clear();
  }
}

export async function connectLocalSimRuntimeClient(
  options: LocalSimRuntimeClientOptions,
): Promise<LocalSimRuntimeClient> {
  const retryWindowMs = Math.max(0, options.connectRetryWindowMs ?? 0);
  const retryDelayMs = Math.max(1, options.connectRetryDelayMs ?? 50);
  const retryableCodes = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT']);
  const startedAtMs = Date.now();
  let attempts = 0;
  let socket: Socket | null = null;
  while (socket === null) {
    attempts += 1;
    try {
      socket = await new Promise<Socket>((resolve, reject) => {
        const client = connect(options.port, options.host);
        const onError = (error: Error): void => {
          client.off('connect', onConnect);
          reject(error);
        };
        const onConnect = (): void => {
          client.off('error', onError);
          resolve(client);
        };

        client.once('error', onError);
        client.once('connect', onConnect);
      });
    } catch (error: unknown) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      const elapsedMs = Date.now() - startedAtMs;
      if (
        retryWindowMs === 0 ||
        typeof code !== 'string' ||
        !retryableCodes.has(code) ||
        elapsedMs >= retryWindowMs
      ) {
        throw error;
      }
      logDebug('client connect retrying', {
        host: options.host,
        port: options.port,
        attempts,
        code,
      });
      await new Promise<void>((resolve) => {
        setTimeout(resolve, Math.max(1, Math.min(retryDelayMs, retryWindowMs - elapsedMs)));
      });
    }
  }

  return new LocalSimRuntimeClient(socket);
}
