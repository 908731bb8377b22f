import { createServer, type AddressInfo, type Server, type Socket } from 'node:net';
import { DEFAULT_MAX_FRAME_BYTES, type JsonObject } from './frame-protocol.ts';
import type { RuntimeCommand } from './runtime-command-parser.ts';
import { executeRuntimeServerCommand } from './runtime-server-command.ts';
import {
  handleConnection,
  type ConnectionState,
  type RuntimeServerConnectionContext,
} from './runtime-server-connection.ts';
import { LocalSimRuntime } from '../runtime/runtime-state.ts';
import { logInfo } from '../log/log-core.ts';

// Room for a full-size response on top of the socket's own high-water mark.
const DEFAULT_MAX_CONNECTION_BUFFERED_BYTES = 4 * DEFAULT_MAX_FRAME_BYTES;

export interface StartLocalSimRuntimeServerOptions {
  host?: string;
  port?: number;
  maxFrameBytes?: number;
  maxConnectionBufferedBytes?: number;
  runtime?: LocalSimRuntime;
}

/**
 * TCP front end for one `LocalSimRuntime`. Each accepted socket is served
 * independently; every connection shares the injected runtime.
 */
export class LocalSimRuntimeServer {
  readonly runtime: LocalSimRuntime;
  private readonly host: string;
  private readonly port: number;
  private readonly maxFrameBytes: number;
  private readonly maxConnectionBufferedBytes: number;
  private readonly server: Server;
  private readonly connections = new Map<string, ConnectionState>();
  private readonly connectionContext: RuntimeServerConnectionContext;
  private readonly closedPromise: Promise<void>;
  private readonly shutdownPromise: Promise<void>;
  private resolveShutdown: () => void = () => undefined;
  private listening = false;
  private shutdownRequested = false;

  constructor(options: StartLocalSimRuntimeServerOptions = {}) {
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? 0;
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
    this.maxConnectionBufferedBytes =
      options.maxConnectionBufferedBytes ?? DEFAULT_MAX_CONNECTION_BUFFERED_BYTES;
    this.runtime = options.runtime ?? new LocalSimRuntime();
    this.connectionContext = {
      maxFrameBytes: this.maxFrameBytes,
      maxConnectionBufferedBytes: this.maxConnectionBufferedBytes,
      connections: this.connections,
      executeCommand: (connection, command) => this.executeCommand(connection, command),
      purgeConnectionForces: (connectionId) => this.runtime.forces.clearByConnection(connectionId),
      requestShutdown: (connection) => {
        this.requestShutdown(connection.id);
      },
    };
    this.server = createServer((socket: Socket) => {
      handleConnection(this.connectionContext, socket);
    });
    this.closedPromise = new Promise<void>((resolve) => {
      this.server.once('close', () => {
        this.listening = false;
        resolve();
      });
    });
    this.shutdownPromise = new Promise<void>((resolve) => {
      this.resolveShutdown = resolve;
    });
  }

  async start(): Promise<void> {
    if (this.listening) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        this.server.off('listening', onListening);
        reject(error);
      };
      const onListening = (): void => {
        this.server.off('error', onError);
        this.listening = true;
        resolve();
      };

      this.server.once('error', onError);
      this.server.once('listening', onListening);
      this.server.listen(this.port, this.host);
    });

    const address = this.address();
    logInfo('runtime listening', {
      host: address.address,
      port: address.port,
    });
  }

  address(): AddressInfo {
    const value = this.server.address();
    if (value === null || typeof value === 'string') {
      throw new Error('runtime server is not listening on tcp');
    }
    return value;
  }

  connectionCount(): number {
    return this.connections.size;
  }

  isShutdownRequested(): boolean {
    return this.shutdownRequested;
  }

  /**
   * Resolves once a SHUTDOWN command has been processed.
   */
  waitForShutdownRequest(): Promise<void> {
    return this.shutdownPromise;
  }

  /**
   * Resolves once the listener is closed and every connection has ended.
   */
  waitForClose(): Promise<void> {
    return this.closedPromise;
  }

  // Stops admitting connections; open ones keep being served until their peers leave.
  requestShutdown(requestedBy: string | null = null): void {
    if (this.shutdownRequested) {
      return;
    }
    this.shutdownRequested = true;
    logInfo('shutdown requested', {
      requestedBy,
      openConnections: this.connections.size,
    });
    if (this.listening) {
      this.server.close();
    }
    this.resolveShutdown();
  }

  async close(): Promise<void> {
    for (const connection of [...this.connections.values()]) {
      connection.socket.destroy();
    }
    if (!this.listening) {
      return;
    }
    if (!this.shutdownRequested) {
      this.server.close();
    }
    await this.closedPromise;
  }

  private executeCommand(connection: ConnectionState, command: RuntimeCommand): JsonObject {
    return executeRuntimeServerCommand({ runtime: this.runtime }, connection, command);
  }
}

export async function startLocalSimRuntimeServer(
  options: StartLocalSimRuntimeServerOptions = {},
): Promise<LocalSimRuntimeServer> {
  const server = new LocalSimRuntimeServer(options);
  await server.start();
  return server;
}
