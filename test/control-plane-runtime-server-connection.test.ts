import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import test from 'node:test';
import {
  consumeFrames,
  encodeFrame,
  parseResponseEnvelope,
} from '../src/control-plane/frame-protocol.ts';
import { executeRuntimeServerCommand } from '../src/control-plane/runtime-server-command.ts';
import {
  handleConnection,
  type ConnectionSocket,
  type ConnectionState,
  type RuntimeServerConnectionContext,
} from '../src/control-plane/runtime-server-connection.ts';
import { LocalSimRuntime } from '../src/runtime/runtime-state.ts';
import { captureLogs, rawLengthHeader } from './control-plane-runtime-server-test-helpers.ts';

class FakeConnectionSocket extends EventEmitter implements ConnectionSocket {
  readonly remoteAddress = '127.0.0.1';
  readonly remotePort = 40100;
  readonly written: Buffer[] = [];
  writableLength = 0;
  // While false, writes land in writableLength and report a full buffer.
  acceptWrites = true;
  paused = false;
  destroyed = false;

  write(chunk: Uint8Array): boolean {
    this.written.push(Buffer.from(chunk));
    if (!this.acceptWrites) {
      this.writableLength += chunk.length;
    }
    return this.acceptWrites;
  }

  end(): void {
    this.destroyed = true;
  }

  destroy(): void {
    this.destroyed = true;
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  drainAll(): void {
    this.acceptWrites = true;
    this.writableLength = 0;
    this.emit('drain');
  }

  writtenReqIds(): number[] {
    const consumed = consumeFrames(Buffer.concat(this.written));
    const reqIds: number[] = [];
    for (const frame of consumed.frames) {
      if (frame.kind !== 'message') {
        continue;
      }
      const response = parseResponseEnvelope(frame.message);
      if (response !== null) {
        reqIds.push(response.req_id);
      }
    }
    return reqIds;
  }
}

function createContext(
  runtime: LocalSimRuntime,
  maxConnectionBufferedBytes = 1_000_000,
): RuntimeServerConnectionContext {
  return {
    maxFrameBytes: 10_000_000,
    maxConnectionBufferedBytes,
    connections: new Map<string, ConnectionState>(),
    executeCommand: (connection, command) =>
      executeRuntimeServerCommand({ runtime }, connection, command),
    purgeConnectionForces: (connectionId) => runtime.forces.clearByConnection(connectionId),
    requestShutdown: () => undefined,
  };
}

void test('connection holds frames and pauses reading while the write buffer is full', () => {
  captureLogs();
  const runtime = new LocalSimRuntime();
  const socket = new FakeConnectionSocket();
  const connection = handleConnection(createContext(runtime), socket);
  socket.acceptWrites = false;

  socket.emit(
    'data',
    Buffer.concat([
      encodeFrame({ cmd: 'PING', req_id: 1, payload: {} }),
      encodeFrame({ cmd: 'SET_VARS', req_id: 2, payload: { values: { x: 1 } } }),
      encodeFrame({ cmd: 'READ_VARS', req_id: 3, payload: { names: ['x'] } }),
    ]),
  );

  assert.deepEqual(socket.writtenReqIds(), [1]);
  assert.equal(socket.paused, true);
  assert.equal(connection.pendingFrames.length, 2);
  assert.deepEqual(runtime.readVars(['x']), { x: null });

  socket.drainAll();

  assert.deepEqual(socket.writtenReqIds(), [1, 2, 3]);
  assert.equal(socket.paused, false);
  assert.equal(connection.pendingFrames.length, 0);
  assert.deepEqual(runtime.readVars(['x']), { x: 1 });
});

void test('connection answers held frames before closing on a framing error', () => {
  captureLogs();
  const socket = new FakeConnectionSocket();
  handleConnection(createContext(new LocalSimRuntime()), socket);
  socket.acceptWrites = false;

  socket.emit(
    'data',
    Buffer.concat([
      encodeFrame({ cmd: 'PING', req_id: 1, payload: {} }),
      encodeFrame({ cmd: 'PING', req_id: 2, payload: {} }),
      rawLengthHeader(0),
    ]),
  );
  assert.deepEqual(socket.writtenReqIds(), [1]);
  assert.equal(socket.destroyed, false);

  socket.drainAll();
  assert.deepEqual(socket.writtenReqIds(), [1, 2]);
  assert.equal(socket.destroyed, true);
});

void test('connection is destroyed once buffered output passes the configured maximum', () => {
  const logs = captureLogs('warn');
  const socket = new FakeConnectionSocket();
  const ctx = createContext(new LocalSimRuntime(), 64);
  const connection = handleConnection(ctx, socket);

  socket.emit('data', encodeFrame({ cmd: 'PING', req_id: 1, payload: {} }));

  assert.equal(socket.destroyed, true);
  assert.equal(connection.closing, true);
  assert.deepEqual(socket.written, []);
  assert.equal(
    logs.lines.filter((line) =>
      line.includes(' WARN [localsim] closing connection on output buffer limit '),
    ).length,
    1,
  );

  socket.emit('data', encodeFrame({ cmd: 'PING', req_id: 2, payload: {} }));
  assert.deepEqual(socket.written, []);
});
