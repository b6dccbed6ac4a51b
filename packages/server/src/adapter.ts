import { BodyChannel } from './channel';
import type { Connection, ConnectionHandler, InboundFrame, RequestHead } from './connection';
import { ContinueNegotiator } from './continue';
import { ProtocolError, TransportError } from './errors';
import type { Executor } from './executor';
import type { HandlerInvoker } from './invoker';
import { describeError, type Logger } from './logger';
import { buildRequest, type Request } from './request';
import type { Response } from './response';
import { ResponseWriter } from './writer';

export type ConnectionPhase = 'idle' | 'building' | 'awaiting' | 'writing' | 'closed';

/**
 * Everything the adapter knows about the request/response pair in flight.
 * Owned by the adapter; a fresh value replaces it when a kept-alive
 * connection goes back to idle.
 */
export interface ConnectionState {
  phase: ConnectionPhase;
  channel?: BodyChannel;
  negotiator?: ContinueNegotiator;
  writer?: ResponseWriter;
  /** The request body has been fully received, or there was none. */
  bodyDone: boolean;
}

export interface ConnectionAdapterOptions {
  invoker: HandlerInvoker;
  executor: Executor;
  logger: Logger;
  /** Request body channel capacity. */
  inbuf: number;
  keepAlive: boolean;
}

function idle(): ConnectionState {
  return { phase: 'idle', bodyDone: true };
}

/**
 * Per-connection actor. Builds the request on the head frame and dispatches
 * it at once, feeds body frames into the request channel (pausing the
 * transport while the channel is over capacity), and hands the handler's
 * response to a `ResponseWriter`.
 */
export class ConnectionAdapter implements ConnectionHandler {
  private state: ConnectionState = idle();
  private peerEnded = false;

  constructor(
    private readonly connection: Connection,
    private readonly options: ConnectionAdapterOptions
  ) {}

  get phase(): ConnectionPhase {
    return this.state.phase;
  }

  onData(frame: InboundFrame): void {
    if (this.state.phase === 'closed') return;
    if (frame.kind === 'head') {
      this.onHead(frame.head);
    } else {
      this.onContent(frame.data, frame.last);
    }
  }

  /**
   * The peer half-closed. A request whose body is still arriving fails; one
   * that is fully received is answered, and the connection closes after it.
   */
  onEnd(): void {
    this.peerEnded = true;
    switch (this.state.phase) {
      case 'idle':
        this.close();
        break;
      case 'building':
        this.onError(new TransportError('Peer ended the connection before the request body'));
        break;
      default:
        break;
    }
  }

  onError(error: Error): void {
    const meta = { connection: this.connection.info.id, ...describeError(error) };
    if (error instanceof TransportError) {
      this.options.logger.debug('connection failed', meta);
    } else {
      this.options.logger.warn('connection failed', meta);
    }
    this.close();
  }

  onClose(): void {
    this.teardown();
  }

  /** Closes the connection if it is not serving a request; used on shutdown. */
  closeIfIdle(): boolean {
    if (this.state.phase !== 'idle') return false;
    this.close();
    return true;
  }

  private onHead(head: RequestHead): void {
    if (this.state.phase !== 'idle') {
      this.protocolError('Request head received while another request is in flight');
      return;
    }
    const { connection } = this;
    const channel = head.hasBody
      ? new BodyChannel({
          capacity: this.options.inbuf,
          onBackpressure: (paused) => (paused ? connection.pause() : connection.resume()),
        })
      : undefined;
    const negotiator = new ContinueNegotiator(head, connection, this.options.logger);

    let request: Request;
    try {
      request = buildRequest(head, {
        body: channel,
        continueExpected: negotiator.expected,
        sendContinue: negotiator.send,
        connection: connection.info,
      });
    } catch (error) {
      this.onError(error instanceof Error ? error : new ProtocolError(String(error)));
      return;
    }

    const state: ConnectionState = {
      phase: channel ? 'building' : 'awaiting',
      channel,
      negotiator,
      bodyDone: channel === undefined,
    };
    this.state = state;
    this.options.logger.debug('request', {
      connection: connection.info.id,
      method: request.method,
      uri: request.uri,
    });
    this.dispatch(state, request).catch((error: unknown) => {
      this.onError(error instanceof Error ? error : new Error(String(error)));
    });
  }

  private onContent(data: Uint8Array, last: boolean): void {
    const { state } = this;
    if (!state.channel || state.bodyDone) {
      this.protocolError('Body content received with no open request body');
      return;
    }
    state.negotiator?.settle();
    if (data.byteLength > 0 && state.channel.push(data) === 'closed') {
      this.options.logger.debug('request body discarded', { connection: this.connection.info.id });
    }
    if (last) {
      state.bodyDone = true;
      state.channel.close();
      if (state.phase === 'building') state.phase = 'awaiting';
    }
  }

  private async dispatch(state: ConnectionState, request: Request): Promise<void> {
    const { invoker, executor, logger, keepAlive } = this.options;
    const response = await invoker.invoke(request);
    if (state.phase === 'closed') {
      discard(response);
      return;
    }
    if (!response) {
      this.close();
      return;
    }

    state.negotiator?.settle();
    state.phase = 'writing';
    const writer = new ResponseWriter({
      connection: this.connection,
      executor,
      logger,
      version: request.version,
      method: request.method,
      keepAlive: keepAlive && wantsKeepAlive(request),
      reusable: () => this.reusable(state),
      release: () => this.release(state),
    });
    state.writer = writer;
    await writer.write(response);
    if (writer.state === 'closed') this.teardown();
  }

  private reusable(state: ConnectionState): boolean {
    return this.state === state && state.phase !== 'closed' && state.bodyDone && !this.peerEnded;
  }

  private release(state: ConnectionState): boolean {
    if (!this.reusable(state)) return false;
    this.state = idle();
    this.connection.resume();
    return true;
  }

  private protocolError(message: string): void {
    this.onError(new ProtocolError(message));
  }

  private close(): void {
    this.teardown();
    this.connection.close();
  }

  private teardown(): void {
    const { state } = this;
    if (state.phase === 'closed') return;
    state.phase = 'closed';
    state.channel?.close();
    state.writer?.abort();
  }
}

function wantsKeepAlive(request: Request): boolean {
  if (request.version !== '1.1') return false;
  const connection = request.headers.get('connection');
  return !connection?.toLowerCase().split(',').some((token) => token.trim() === 'close');
}

function discard(response: Response | undefined): void {
  if (response?.body instanceof BodyChannel) response.body.close();
}
