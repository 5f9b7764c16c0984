import { EventEmitter } from 'events';
import * as fs from 'fs/promises';
import net, { AddressInfo, Server } from 'net';
import * as path from 'path';
import { DEFAULT_LINGER_MS, DEFAULT_POLL_INTERVAL_MS } from '../../shared/constants/protocol';
import { ReceiveSummary, Result, StatusReporter } from '../../shared/types/transfer';
import { receiveFile } from '../transfer/FileReceiver';
import { logger, reportStatus } from '../utils/logger';
import { errorMessage } from './errors';
import { SocketStream } from './transport/SocketStream';

/** Liveness flag shared between `stop()` and the accept loop. */
export interface AcceptorState {
  running: boolean;
}

export interface ConnectionAcceptorOptions {
  pollIntervalMs?: number;
  lingerMs?: number;
  reporter?: StatusReporter;
}

export interface SessionEndEvent {
  remoteAddress: string;
  result: Result<ReceiveSummary>;
}

/**
 * Listens for senders and starts one receiver session per accepted connection.
 * Sessions are neither tracked nor limited in number; `stop()` only closes the
 * listening socket and leaves in-flight sessions to finish on their own.
 *
 * Events: 'listening' (AddressInfo), 'connection' (remote address),
 * 'session-end' (SessionEndEvent), 'stopped'.
 */
export class ConnectionAcceptor extends EventEmitter {
  private readonly state: AcceptorState = { running: false };
  private readonly pollIntervalMs: number;
  private readonly lingerMs: number;
  private server: Server | null = null;
  private pollTimer: NodeJS.Timeout | null = null;
  private stopWaiters: Array<() => void> = [];
  private destinationDir = '';

  constructor(private readonly options: ConnectionAcceptorOptions = {}) {
    super();
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.lingerMs = options.lingerMs ?? DEFAULT_LINGER_MS;
  }

  get running(): boolean {
    return this.state.running;
  }

  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  async start(host: string, port: number, destinationDir: string): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('Connection acceptor is already started');
    }

    this.destinationDir = path.resolve(destinationDir);
    await fs.mkdir(this.destinationDir, { recursive: true });

    // No maxConnections: every accepted socket gets its own session.
    const server = net.createServer((socket) => this.accept(socket));

    // libuv sets SO_REUSEADDR on listening TCP sockets, so a restart can rebind
    // while old connections sit in TIME_WAIT.
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      server.once('error', onError);
      server.listen({ host, port }, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (error) => {
      logger.error('File server error', { error: error.message });
    });

    this.server = server;
    this.state.running = true;
    this.pollTimer = setInterval(() => this.poll(), this.pollIntervalMs);

    const address = this.address();
    if (!address) {
      throw new Error('Listening socket has no TCP address');
    }

    this.report(`Server listening on ${host}:${address.port}`);
    this.report(`Files will be saved to: ${this.destinationDir}`);
    this.emit('listening', address);
    return address;
  }

  /** Clears the running flag; resolves once the accept loop has noticed and closed the listener. */
  stop(): Promise<void> {
    if (!this.server) {
      return Promise.resolve();
    }
    this.state.running = false;
    return new Promise<void>((resolve) => {
      this.stopWaiters.push(resolve);
    });
  }

  private poll(): void {
    if (this.state.running) {
      return;
    }

    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }

    const server = this.server;
    this.server = null;
    server?.close((error) => {
      if (error) {
        logger.warn('Listening socket was already closed', { error: error.message });
      } else {
        logger.debug('Last connection of stopped server closed');
      }
    });

    this.report('Server stopped');
    this.emit('stopped');

    const waiters = this.stopWaiters;
    this.stopWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private accept(socket: net.Socket): void {
    const stream = new SocketStream(socket, { lingerMs: this.lingerMs });
    const remoteAddress = stream.remoteAddress;

    this.report(`New connection from ${remoteAddress}`);
    this.emit('connection', remoteAddress);

    void this.runSession(stream, remoteAddress);
  }

  private async runSession(stream: SocketStream, remoteAddress: string): Promise<void> {
    try {
      const result = await receiveFile(stream, {
        destinationDir: this.destinationDir,
        reporter: this.options.reporter,
      });
      const event: SessionEndEvent = { remoteAddress, result };
      this.emit('session-end', event);
    } catch (error) {
      logger.error('Receive session crashed', { remote: remoteAddress, error: errorMessage(error) });
    }
  }

  private report(message: string): void {
    reportStatus(this.options.reporter, message);
  }
}
