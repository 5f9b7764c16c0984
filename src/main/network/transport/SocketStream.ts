import { EventEmitter } from 'events';
import net from 'net';
import { Duplex } from 'stream';
import { DEFAULT_LINGER_MS } from '../../../shared/constants/protocol';
import { logger } from '../../utils/logger';

/**
 * Pull-based view of a connection. `read` resolves with at most `size` bytes and
 * with an empty buffer once the peer has ended the stream.
 */
export interface ByteStream {
  readonly remoteAddress: string;
  read(size: number): Promise<Buffer>;
  write(data: Buffer): Promise<void>;
  close(): Promise<void>;
}

interface PendingRead {
  size: number;
  resolve: (data: Buffer) => void;
  reject: (error: Error) => void;
}

export interface SocketStreamOptions {
  lingerMs?: number;
  highWaterMark?: number;
}

const DEFAULT_HIGH_WATER_MARK = 1024 * 1024;

export class SocketStream extends EventEmitter implements ByteStream {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private pending: PendingRead | null = null;
  private ended = false;
  private failure: Error | null = null;
  private closing: Promise<void> | null = null;
  private readonly lingerMs: number;
  private readonly highWaterMark: number;

  constructor(
    private readonly duplex: Duplex,
    options: SocketStreamOptions = {}
  ) {
    super();
    this.lingerMs = options.lingerMs ?? DEFAULT_LINGER_MS;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;

    duplex.on('data', (chunk: Buffer | string) => this.handleData(chunk));
    duplex.on('end', () => {
      this.ended = true;
      this.settlePending();
    });
    duplex.on('close', () => {
      this.ended = true;
      this.settlePending();
      this.emit('close');
    });
    duplex.on('error', (error: Error) => {
      logger.debug('Stream error', { remote: this.remoteAddress, error: error.message });
      this.failure = error;
      this.settlePending();
    });
  }

  get remoteAddress(): string {
    if (this.duplex instanceof net.Socket && this.duplex.remoteAddress) {
      return `${this.duplex.remoteAddress}:${this.duplex.remotePort ?? 0}`;
    }
    return 'local';
  }

  read(size: number): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new Error('Concurrent reads are not supported'));
    }
    if (this.buffered > 0) {
      return Promise.resolve(this.take(size));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended || size === 0) {
      return Promise.resolve(Buffer.alloc(0));
    }

    return new Promise<Buffer>((resolve, reject) => {
      this.pending = { size, resolve, reject };
    });
  }

  write(data: Buffer): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.duplex.destroyed || this.duplex.writableEnded) {
      return Promise.reject(new Error('Stream is no longer writable'));
    }

    return new Promise<void>((resolve, reject) => {
      this.duplex.write(data, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Half-closes the stream and keeps draining the peer until it closes too, so
   * unread bytes (for example a trailing end marker) never turn into a reset.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = new Promise<void>((resolve) => {
        if (this.duplex.destroyed) {
          resolve();
          return;
        }

        const timer = setTimeout(() => {
          this.duplex.destroy();
        }, this.lingerMs);
        this.once('close', () => {
          clearTimeout(timer);
          resolve();
        });

        this.chunks = [];
        this.buffered = 0;
        this.duplex.resume();
        if (this.ended) {
          this.duplex.destroy();
        } else if (!this.duplex.writableEnded) {
          this.duplex.end();
        }
      });
    }
    return this.closing;
  }

  private handleData(chunk: Buffer | string): void {
    if (this.closing) {
      return;
    }
    const data = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    this.chunks.push(data);
    this.buffered += data.length;

    if (this.buffered >= this.highWaterMark) {
      this.duplex.pause();
    }
    this.settlePending();
  }

  private settlePending(): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }

    if (this.buffered > 0) {
      this.pending = null;
      pending.resolve(this.take(pending.size));
    } else if (this.failure) {
      this.pending = null;
      pending.reject(this.failure);
    } else if (this.ended) {
      this.pending = null;
      pending.resolve(Buffer.alloc(0));
    }
  }

  private take(size: number): Buffer {
    const parts: Buffer[] = [];
    let remaining = size;

    while (remaining > 0 && this.chunks.length > 0) {
      const head = this.chunks[0];
      if (head.length <= remaining) {
        parts.push(head);
        this.chunks.shift();
        remaining -= head.length;
      } else {
        parts.push(head.subarray(0, remaining));
        this.chunks[0] = head.subarray(remaining);
        remaining = 0;
      }
    }

    const data = parts.length === 1 ? parts[0] : Buffer.concat(parts);
    this.buffered -= data.length;

    if (this.buffered < this.highWaterMark && this.duplex.isPaused() && !this.ended) {
      this.duplex.resume();
    }
    return data;
  }
}

export interface ConnectOptions {
  host: string;
  port: number;
  lingerMs?: number;
}

/**
 * Opens a TCP connection. Half-open is allowed so the sender can still write its
 * end marker after the receiver has already finished and shut down its side.
 */
export function connectTcp(options: ConnectOptions): Promise<SocketStream> {
  return new Promise<SocketStream>((resolve, reject) => {
    const socket = net.createConnection({
      host: options.host,
      port: options.port,
      allowHalfOpen: true,
    });

    const onError = (error: Error) => {
      socket.destroy();
      reject(error);
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      socket.off('error', onError);
      socket.setNoDelay(true);
      resolve(new SocketStream(socket, { lingerMs: options.lingerMs }));
    });
  });
}
