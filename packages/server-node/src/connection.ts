import type { Socket } from 'node:net';
import {
  TransportError,
  type Connection,
  type ConnectionHandler,
  type ConnectionInfo,
  type InboundFrame,
  type OutboundFrame,
} from '@sluice/server';
import { ResponseEncoder } from './codec';

/**
 * `Connection` over a Node socket. Writes resolve from the socket's write
 * callback; closing ends the socket once.
 *
 * Inbound frames go through a backlog: while paused, frames already decoded
 * from a read are held back and handed over on `resume()`, before the
 * socket itself is resumed. The end of input waits behind them.
 */
export class NodeConnection implements Connection {
  readonly info: ConnectionInfo;
  private readonly encoder = new ResponseEncoder();
  private readonly backlog: InboundFrame[] = [];
  private handler?: ConnectionHandler;
  private isClosed = false;
  private isPaused = false;
  private ended = false;
  private flushing = false;

  constructor(
    private readonly socket: Socket,
    id: string,
    secure = false
  ) {
    this.info = {
      id,
      secure,
      remoteAddress: socket.remoteAddress,
      remotePort: socket.remotePort,
      localAddress: socket.localAddress,
      localPort: socket.localPort,
    };
  }

  get closed(): boolean {
    return this.isClosed || this.socket.destroyed;
  }

  get paused(): boolean {
    return this.isPaused;
  }

  /** Number of decoded frames waiting for the handler. */
  get pending(): number {
    return this.backlog.length;
  }

  attach(handler: ConnectionHandler): void {
    this.handler = handler;
    this.flush();
  }

  /** Queues frames decoded from the socket and delivers as many as the handler will take. */
  receive(frames: Iterable<InboundFrame>): void {
    if (this.closed) return;
    this.backlog.push(...frames);
    this.flush();
  }

  /** The socket has no more input; the handler hears of it once the backlog is delivered. */
  receiveEnd(): void {
    this.ended = true;
    this.flush();
  }

  write(frame: OutboundFrame): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.closed) {
        reject(new TransportError('Connection is closed'));
        return;
      }
      const data = this.encoder.encode(frame);
      if (data.length === 0) {
        resolve();
        return;
      }
      this.socket.write(data, (err?: Error | null) => {
        if (err) {
          reject(new TransportError('Socket write failed', { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  pause(): void {
    this.isPaused = true;
    this.socket.pause();
  }

  resume(): void {
    if (this.closed) return;
    this.isPaused = false;
    this.flush();
    if (!this.isPaused && !this.closed) this.socket.resume();
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.backlog.length = 0;
    this.socket.end();
  }

  private flush(): void {
    const { handler } = this;
    if (!handler || this.flushing) return;
    this.flushing = true;
    try {
      while (!this.isPaused && !this.closed) {
        const frame = this.backlog.shift();
        if (frame === undefined) {
          if (this.ended) {
            this.ended = false;
            handler.onEnd();
          }
          return;
        }
        handler.onData(frame);
      }
    } finally {
      this.flushing = false;
    }
  }
}
