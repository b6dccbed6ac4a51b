import net from 'node:net';
import tls from 'node:tls';
import { Type } from '@sinclair/typebox';
import {
  ConnectionAdapter,
  HandlerInvoker,
  ProtocolError,
  TransportError,
  describeError,
  resolveConfig,
  type Handler,
  type InboundFrame,
  type ListenOptions,
  type ResolvedConfig,
  type RunningServer,
  type Server,
  type ServerOptions,
} from '@sluice/server';
import { RequestDecoder } from './codec';
import { NodeConnection } from './connection';
import { TlsOptions, secureServerOptions } from './tls';

export * from '@sluice/server';
export * from './codec';
export * from './connection';
export * from './tls';

export type NodeServerOptions = ServerOptions & {
  tls?: TlsOptions;
};

export class NodeServer implements Server {
  readonly config: ResolvedConfig;
  private readonly invoker: HandlerInvoker;
  private readonly tlsOptions?: tls.TlsOptions;
  private readonly adapters = new Set<ConnectionAdapter>();
  private sequence = 0;

  /** Throws `ConfigError` for invalid options or unusable TLS material. */
  constructor(handler: Handler, options: NodeServerOptions = {}) {
    this.config = resolveConfig(options, { tls: Type.Optional(TlsOptions) });
    this.tlsOptions = options.tls && secureServerOptions(options.tls);
    this.invoker = new HandlerInvoker({
      handler,
      executor: this.config.executor,
      logger: this.config.logger,
      timeout: this.config.handlerTimeout,
    });
  }

  listen({
    host = this.config.host,
    port = this.config.port,
  }: ListenOptions = {}): Promise<RunningServer> {
    const { logger, backlog } = this.config;
    return new Promise((resolve, reject) => {
      // half-open: a client may end its side after the request and still read the response
      const server: net.Server = this.tlsOptions
        ? tls.createServer({ ...this.tlsOptions, allowHalfOpen: true }, (socket) =>
            this.accept(socket, true)
          )
        : net.createServer({ allowHalfOpen: true }, (socket) => this.accept(socket, false));
      if (server instanceof tls.Server) {
        server.on('tlsClientError', (error) => {
          logger.debug('tls handshake failed', describeError(error));
        });
      }
      server.once('error', (error) => {
        reject(error);
      });
      server.on('listening', () => {
        const address = server.address();
        if (!address) return reject(new Error('Server address is not available'));
        if (typeof address === 'string') return reject(new Error('Socket address not supported'));
        const host = address.address;
        const port = address.port;
        const scheme = this.tlsOptions ? 'https' : 'http';
        const url =
          address.family === 'IPv6'
            ? new URL(`${scheme}://[${host}]:${port}`)
            : new URL(`${scheme}://${host}:${port}`);
        server.on('error', (error) => {
          logger.error('server error', describeError(error));
        });
        logger.info('listening', { url: url.href });
        resolve({
          host,
          port,
          url,
          stop: () =>
            new Promise((resolve, reject) => {
              server.close((error) => {
                if (error) return reject(error);
                logger.info('stopped', { url: url.href });
                resolve();
              });
              for (const adapter of this.adapters) adapter.closeIfIdle();
            }),
        });
      });
      server.listen({ host, port, backlog });
    });
  }

  private accept(socket: net.Socket, secure: boolean): void {
    const { chunkSize, idleTimeout, inbuf, keepAlive, executor, logger } = this.config;
    const connection = new NodeConnection(socket, String(++this.sequence), secure);
    const adapter = new ConnectionAdapter(connection, {
      invoker: this.invoker,
      executor,
      logger,
      inbuf,
      keepAlive,
    });
    const decoder = new RequestDecoder({ chunkSize });
    this.adapters.add(adapter);
    connection.attach(adapter);

    socket.on('data', (data: Buffer) => {
      if (connection.closed) return;
      let frames: InboundFrame[];
      try {
        frames = decoder.push(data);
      } catch (error) {
        adapter.onError(
          error instanceof ProtocolError
            ? error
            : new ProtocolError('Malformed request', { cause: error })
        );
        return;
      }
      connection.receive(frames);
    });
    socket.on('end', () => {
      connection.receiveEnd();
    });
    socket.on('error', (error) => {
      adapter.onError(
        error instanceof TransportError ? error : new TransportError(error.message, { cause: error })
      );
    });
    socket.on('close', () => {
      this.adapters.delete(adapter);
      adapter.onClose();
    });
    if (idleTimeout > 0) {
      socket.setTimeout(idleTimeout, () => {
        socket.destroy(new TransportError(`Idle for ${idleTimeout}ms`));
      });
    }
  }
}
