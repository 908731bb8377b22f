import { randomUUID } from 'node:crypto';
import {
  consumeFrames,
  encodeFrame,
  errorResponse,
  okResponse,
  parseRequestEnvelope,
  UNCORRELATED_REQ_ID,
  type DecodedFrame,
  type FramingError,
  type JsonObject,
  type RuntimeRequestEnvelope,
  type RuntimeResponseEnvelope,
} from './frame-protocol.ts';
import { parseRuntimeCommand, type RuntimeCommand } from './runtime-command-parser.ts';
import { CommandError } from '../runtime/runtime-state.ts';
import { logDebug, logError, logInfo, logWarn, startLogSpan } from '../log/log-core.ts';

export interface ConnectionSocket {
  readonly remoteAddress?: string | undefined;
  readonly remotePort?: number | undefined;
  readonly writableLength: number;
  write(chunk: Uint8Array): boolean;
  end(): void;
  destroy(): void;
  pause(): void;
  resume(): void;
  on(event: 'data', listener: (chunk: Buffer) => void): void;
  on(event: 'drain', listener: () => void): void;
  on(event: 'error', listener: (error: Error) => void): void;
  on(event: 'close', listener: () => void): void;
}

export interface ConnectionState {
  readonly id: string;
  readonly peer: string;
  readonly socket: ConnectionSocket;
  remainder: Buffer;
  // Decoded frames held back while the peer is not reading its responses.
  pendingFrames: DecodedFrame[];
  pendingFramingError: FramingError | null;
  queuedPayloads: Buffer[];
  queuedPayloadBytes: number;
  writeBlocked: boolean;
  readPaused: boolean;
  // Set once no further frames from this peer may be processed.
  closing: boolean;
}

export interface RuntimeServerConnectionContext {
  readonly maxFrameBytes: number;
  readonly maxConnectionBufferedBytes: number;
  readonly connections: Map<string, ConnectionState>;
  executeCommand(connection: ConnectionState, command: RuntimeCommand): JsonObject;
  purgeConnectionForces(connectionId: string): number;
  requestShutdown(connection: ConnectionState): void;
}

function describePeer(socket: ConnectionSocket): string {
  return `${socket.remoteAddress ?? 'unknown'}:${String(socket.remotePort ?? 0)}`;
}

export function handleConnection(
  ctx: RuntimeServerConnectionContext,
  socket: ConnectionSocket,
): ConnectionState {
  const connection: ConnectionState = {
    id: `connection-${randomUUID()}`,
    peer: describePeer(socket),
    socket,
    remainder: Buffer.alloc(0),
    pendingFrames: [],
    pendingFramingError: null,
    queuedPayloads: [],
    queuedPayloadBytes: 0,
    writeBlocked: false,
    readPaused: false,
    closing: false,
  };
  ctx.connections.set(connection.id, connection);
  logInfo('client connected', {
    peer: connection.peer,
    connectionId: connection.id,
  });

  socket.on('data', (chunk: Buffer) => {
    handleSocketData(ctx, connection, chunk);
  });

  socket.on('drain', () => {
    connection.writeBlocked = false;
    flushConnectionWrites(ctx, connection);
    processPendingFrames(ctx, connection);
  });

  socket.on('error', (error: Error) => {
    logDebug('client socket error', {
      connectionId: connection.id,
      message: error.message,
    });
    cleanupConnection(ctx, connection.id);
  });

  socket.on('close', () => {
    cleanupConnection(ctx, connection.id);
  });

  return connection;
}

export function sendToConnection(
  ctx: RuntimeServerConnectionContext,
  connection: ConnectionState,
  response: RuntimeResponseEnvelope,
): void {
  const payload = encodeFrame(response);
  connection.queuedPayloads.push(payload);
  connection.queuedPayloadBytes += payload.length;

  if (connectionBufferedBytes(connection) > ctx.maxConnectionBufferedBytes) {
    terminateForBufferedOutput(ctx, connection);
    return;
  }

  flushConnectionWrites(ctx, connection);
}

export function flushConnectionWrites(
  ctx: RuntimeServerConnectionContext,
  connection: ConnectionState,
): void {
  if (connection.writeBlocked || connection.closing) {
    return;
  }

  let payload = connection.queuedPayloads.shift();
  while (payload !== undefined) {
    connection.queuedPayloadBytes -= payload.length;
    if (!connection.socket.write(payload)) {
      connection.writeBlocked = true;
      break;
    }
    payload = connection.queuedPayloads.shift();
  }

  if (connectionBufferedBytes(connection) > ctx.maxConnectionBufferedBytes) {
    terminateForBufferedOutput(ctx, connection);
  }
}

function connectionBufferedBytes(connection: ConnectionState): number {
  return connection.queuedPayloadBytes + connection.socket.writableLength;
}

export function handleSocketData(
  ctx: RuntimeServerConnectionContext,
  connection: ConnectionState,
  chunk: Buffer,
): void {
  if (connection.closing || connection.pendingFramingError !== null) {
    return;
  }
  const combined =
    connection.remainder.length === 0 ? chunk : Buffer.concat([connection.remainder, chunk]);
  const consumed = consumeFrames(combined, ctx.maxFrameBytes);
  connection.remainder = consumed.remainder;
  for (const frame of consumed.frames) {
    connection.pendingFrames.push(frame);
  }
  connection.pendingFramingError = consumed.error;

  processPendingFrames(ctx, connection);
}

/**
 * Handles held-back frames in arrival order until the socket reports a full
 * write buffer. Reading stays paused until `drain` lets the rest through.
 */
export function processPendingFrames(
  ctx: RuntimeServerConnectionContext,
  connection: ConnectionState,
): void {
  while (!connection.closing && !connection.writeBlocked) {
    const frame = connection.pendingFrames.shift();
    if (frame === undefined) {
      break;
    }
    handleFrame(ctx, connection, frame);
  }

  if (connection.closing) {
    return;
  }

  if (connection.writeBlocked) {
    if (!connection.readPaused) {
      connection.readPaused = true;
      connection.socket.pause();
      logDebug('paused reading until client drains responses', {
        connectionId: connection.id,
        heldFrames: connection.pendingFrames.length,
      });
    }
    return;
  }

  if (connection.pendingFramingError !== null) {
    terminateForFramingError(connection, connection.pendingFramingError);
    return;
  }

  if (connection.readPaused) {
    connection.readPaused = false;
    connection.socket.resume();
  }
}

function handleFrame(
  ctx: RuntimeServerConnectionContext,
  connection: ConnectionState,
  frame: DecodedFrame,
): void {
  if (frame.kind === 'invalid-json') {
    sendToConnection(
      ctx,
      connection,
      errorResponse(UNCORRELATED_REQ_ID, `JSON parse error: ${frame.error}`),
    );
    return;
  }

  const parsed = parseRequestEnvelope(frame.message);
  if (!parsed.ok) {
    sendToConnection(ctx, connection, errorResponse(parsed.reqId, parsed.error));
    return;
  }

  handleRequest(ctx, connection, parsed.envelope);
}

type CommandOutcome =
  | {
      ok: true;
      command: RuntimeCommand;
      result: JsonObject;
    }
  | {
      ok: false;
      message: string;
    };

function runCommand(
  ctx: RuntimeServerConnectionContext,
  connection: ConnectionState,
  request: RuntimeRequestEnvelope,
): CommandOutcome {
  try {
    const command = parseRuntimeCommand(request.cmd, request.payload);
    return {
      ok: true,
      command,
      result: ctx.executeCommand(connection, command),
    };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    if (!(error instanceof CommandError)) {
      logError('command failed unexpectedly', {
        cmd: request.cmd,
        connectionId: connection.id,
        message,
      });
    }
    return {
      ok: false,
      message,
    };
  }
}

export function handleRequest(
  ctx: RuntimeServerConnectionContext,
  connection: ConnectionState,
  request: RuntimeRequestEnvelope,
): void {
  const span = startLogSpan('command', {
    cmd: request.cmd,
    reqId: request.req_id,
    connectionId: connection.id,
  });

  const outcome = runCommand(ctx, connection, request);
  if (!outcome.ok) {
    span.end({ status: 'failed' });
    sendToConnection(ctx, connection, errorResponse(request.req_id, outcome.message));
    return;
  }

  span.end({ status: 'completed' });
  sendToConnection(ctx, connection, okResponse(request.req_id, outcome.result));

  if (outcome.command.cmd === 'SHUTDOWN') {
    connection.closing = true;
    connection.socket.end();
    ctx.requestShutdown(connection);
  }
}

function terminateForFramingError(connection: ConnectionState, error: FramingError): void {
  logWarn('closing connection on framing error', {
    peer: connection.peer,
    connectionId: connection.id,
    declaredLength: error.declaredLength,
  });
  connection.closing = true;
  connection.remainder = Buffer.alloc(0);
  connection.pendingFrames = [];
  connection.socket.destroy();
}

function terminateForBufferedOutput(
  ctx: RuntimeServerConnectionContext,
  connection: ConnectionState,
): void {
  logWarn('closing connection on output buffer limit', {
    peer: connection.peer,
    connectionId: connection.id,
    bufferedBytes: connectionBufferedBytes(connection),
    maxBufferedBytes: ctx.maxConnectionBufferedBytes,
  });
  connection.closing = true;
  connection.pendingFrames = [];
  connection.queuedPayloads = [];
  connection.queuedPayloadBytes = 0;
  connection.socket.destroy();
}

export function cleanupConnection(ctx: RuntimeServerConnectionContext, connectionId: string): void {
  const connection = ctx.connections.get(connectionId);
  if (connection === undefined) {
    return;
  }
  ctx.connections.delete(connectionId);
  connection.closing = true;

  const purged = ctx.purgeConnectionForces(connectionId);
  if (purged > 0) {
    logWarn('cleared force owners on disconnect', {
      peer: connection.peer,
      connectionId,
      owners: purged,
    });
  }
  connection.socket.destroy();
  logInfo('client disconnected', {
    peer: connection.peer,
    connectionId,
  });
}
