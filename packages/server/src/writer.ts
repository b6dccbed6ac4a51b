import { BodyChannel } from './channel';
import type { Connection, HttpVersion, OutboundFrame, ResponseHead } from './connection';
import { TransportError } from './errors';
import type { Executor } from './executor';
import { describeError, type Logger } from './logger';
import type { Response, ResponseBody } from './response';

export type WriterState = 'idle' | 'head-written' | 'draining' | 'done' | 'closed';

export interface ResponseWriterOptions {
  connection: Connection;
  executor: Executor;
  logger: Logger;
  /** Protocol version of the request being answered. */
  version: HttpVersion;
  method: string;
  /** Leave the connection open after the response instead of closing it. */
  keepAlive?: boolean;
  /**
   * Whether the connection could be taken back right now. Checked when the
   * head is written, so a response that cannot keep its connection says so.
   */
  reusable?: () => boolean;
  /**
   * Called once a keep-alive response is complete. Returns true when the
   * connection has been taken back for another request; otherwise the
   * writer closes it.
   */
  release?: () => boolean;
}

const TERMINAL: OutboundFrame = { kind: 'content', data: new Uint8Array(0), last: true };

/**
 * Writes one response: head first, then the body according to its kind,
 * then exactly one terminal frame, then closes the connection (or hands it
 * back when kept alive). Any failed write closes the body channel and the
 * connection; partial writes are never retried.
 */
export class ResponseWriter {
  private current: WriterState = 'idle';
  private body: Uint8Array | BodyChannel | undefined;
  private persistent = false;

  constructor(private readonly options: ResponseWriterOptions) {}

  get state(): WriterState {
    return this.current;
  }

  /** Never rejects: failures are logged and end with the connection closed. */
  async write(response: Response): Promise<void> {
    if (this.current !== 'idle') {
      throw new Error(`Response already written (writer is ${this.current})`);
    }
    this.body = normalizeBody(response.body);
    try {
      const head = this.prepareHead(response.status, response.headers);
      await this.options.connection.write({ kind: 'head', head });
      this.current = 'head-written';
      if (this.body instanceof BodyChannel) {
        await this.drain(this.body);
      } else if (this.body === undefined) {
        await this.options.connection.write(TERMINAL);
      } else {
        await this.options.connection.write({ kind: 'content', data: this.body, last: true });
      }
    } catch (error) {
      this.fail(error);
      return;
    }
    this.finish();
  }

  /** Releases a drain in progress; used when the connection goes away underneath. */
  abort(): void {
    if (this.body instanceof BodyChannel) this.body.close();
  }

  private prepareHead(status: number, init: Response['headers']): ResponseHead {
    const { version, method } = this.options;
    const headers = new Headers(init);
    let chunked = false;
    let closeDelimited = false;

    if (status < 200 || status === 204 || status === 304) {
      this.discardBody();
    } else if (this.body === undefined) {
      headers.set('content-length', '0');
    } else if (this.body instanceof BodyChannel) {
      if (!headers.has('content-length')) {
        if (version === '1.1') {
          headers.set('transfer-encoding', 'chunked');
          chunked = true;
        } else {
          closeDelimited = true;
        }
      }
    } else {
      headers.set('content-length', String(this.body.byteLength));
    }

    if (method === 'HEAD') {
      this.discardBody();
      chunked = false;
    }

    const { keepAlive = false, reusable } = this.options;
    this.persistent =
      keepAlive && !closeDelimited && !requestsClose(headers) && (reusable?.() ?? true);
    if (!this.persistent) headers.set('connection', 'close');

    return { version, status, headers, chunked };
  }

  private discardBody(): void {
    this.abort();
    this.body = undefined;
  }

  private async drain(channel: BodyChannel): Promise<void> {
    const { connection, executor } = this.options;
    this.current = 'draining';
    for (;;) {
      const chunk = await executor.run(() => channel.take());
      if (chunk === undefined) break;
      if (chunk.byteLength === 0) continue;
      await connection.write({ kind: 'content', data: chunk, last: false });
    }
    await connection.write(TERMINAL);
  }

  private finish(): void {
    this.current = 'done';
    if (this.persistent && this.options.release?.()) return;
    this.current = 'closed';
    this.options.connection.close();
  }

  private fail(error: unknown): void {
    const { connection, logger } = this.options;
    const meta = { connection: connection.info.id, ...describeError(error) };
    if (error instanceof TransportError) {
      logger.debug('response aborted', meta);
    } else {
      logger.warn('response write failed', meta);
    }
    this.abort();
    this.current = 'closed';
    connection.close();
  }
}

function requestsClose(headers: Headers): boolean {
  const connection = headers.get('connection');
  return connection?.toLowerCase().split(',').some((token) => token.trim() === 'close') ?? false;
}

function normalizeBody(body: ResponseBody | undefined): Uint8Array | BodyChannel | undefined {
  return typeof body === 'string' ? new TextEncoder().encode(body) : body;
}
