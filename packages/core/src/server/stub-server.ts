import { createServer } from 'node:net';
import type { AddressInfo, Server, Socket } from 'node:net';
import { EventEmitter } from 'node:events';
import { TransportError, errorMessage, silentLogger } from '@rsp-stub/shared';
import type { Logger } from '@rsp-stub/shared';
import type { DebugBackend } from '../backend.ts';
import { SocketTransport } from '../rsp/transport.ts';
import { StubSession } from '../rsp/session.ts';
import type { StubSessionOptions } from '../rsp/session.ts';

export interface StubServerOptions extends StubSessionOptions {
  host?: string;
  port?: number;
}

/**
 * TCP front end for a `StubSession`. One debugger at a time; a second
 * connection is dropped while the first is attached. Emits `connection`,
 * `disconnect`, `sessionError` and `serverError`.
 */
export class StubServer extends EventEmitter {
  readonly host: string;
  readonly port: number;
  private readonly backend: DebugBackend;
  private readonly sessionOptions: StubSessionOptions;
  private readonly logger: Logger;
  protected readonly server: Server;
  private active: SocketTransport | null = null;

  constructor(backend: DebugBackend, options: StubServerOptions = {}) {
    super();
    const { host = '127.0.0.1', port = 1234, ...sessionOptions } = options;
    this.host = host;
    this.port = port;
    this.backend = backend;
    this.logger = options.logger ?? silentLogger;
    this.sessionOptions = { awaitInitialAck: true, ...sessionOptions };
    this.server = createServer((socket) => this.handleConnection(socket));
    // Bind failures reject listen(); this covers errors once accepting.
    this.server.on('error', (err) => {
      if (!this.server.listening) return;
      this.logger.error(`Stub listener error: ${err.message}`);
      this.emit('serverError', err);
    });
  }

  get attached(): boolean {
    return this.active !== null;
  }

  listen(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', reject);
        const address = this.address();
        if (!address) {
          reject(new TransportError('Server is not bound to a TCP address'));
          return;
        }
        this.logger.info(`Stub listening on ${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  address(): AddressInfo | null {
    const address = this.server.address();
    return typeof address === 'object' ? address : null;
  }

  close(): Promise<void> {
    this.active?.close();
    return new Promise((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private handleConnection(socket: Socket): void {
    const peer = `${socket.remoteAddress ?? '?'}:${socket.remotePort ?? '?'}`;
    if (this.active) {
      this.logger.warn(`Refusing ${peer}: a debugger is already attached`);
      socket.destroy();
      return;
    }

    socket.setNoDelay(true);
    const transport = new SocketTransport(socket);
    this.active = transport;
    this.logger.info(`Debugger attached from ${peer}`);
    this.emit('connection', peer);

    const session = new StubSession(transport, this.backend, this.sessionOptions);
    session
      .run()
      .catch((err: unknown) => {
        this.logger.error(`Session with ${peer} failed: ${errorMessage(err)}`);
        this.emit('sessionError', err);
      })
      .finally(() => {
        transport.close();
        this.active = null;
        this.emit('disconnect', peer);
      });
  }
}
