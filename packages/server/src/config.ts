import { Type, type Static, type TProperties } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { DEFAULT_CAPACITY } from './channel';
import { ConfigError } from './errors';
import { DEFAULT_WORKERS, Executor } from './executor';
import { createLogger, type Logger } from './logger';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8080;
export const DEFAULT_CHUNK_SIZE = 16 * 1024 * 1024;
export const DEFAULT_BACKLOG = 1024;
export const DEFAULT_IDLE_TIMEOUT = 60_000;

export const ServerSettings = Type.Object({
  host: Type.Optional(Type.String({ minLength: 1 })),
  port: Type.Optional(Type.Integer({ minimum: 0, maximum: 65535 })),
  /** Largest body frame handed to a request channel. */
  chunkSize: Type.Optional(Type.Integer({ minimum: 1 })),
  /** Request body channel capacity, in chunks. */
  inbuf: Type.Optional(Type.Integer({ minimum: 1 })),
  backlog: Type.Optional(Type.Integer({ minimum: 1 })),
  /** Size of the executor created when none is given. */
  workers: Type.Optional(Type.Integer({ minimum: 1 })),
  /** Reuse HTTP/1.1 connections for further requests instead of closing after each response. */
  keepAlive: Type.Optional(Type.Boolean()),
  /** Milliseconds of socket inactivity before the connection is dropped; 0 disables. */
  idleTimeout: Type.Optional(Type.Integer({ minimum: 0 })),
  /** Milliseconds a handler may take to produce its response; 0 disables. */
  handlerTimeout: Type.Optional(Type.Integer({ minimum: 0 })),
  logLevel: Type.Optional(
    Type.Union([
      Type.Literal('debug'),
      Type.Literal('info'),
      Type.Literal('warn'),
      Type.Literal('error'),
      Type.Literal('silent'),
    ])
  ),
});

export type ServerSettings = Static<typeof ServerSettings>;

export type ServerOptions = ServerSettings & {
  executor?: Executor;
  logger?: Logger;
};

export interface ResolvedConfig {
  host: string;
  port: number;
  chunkSize: number;
  inbuf: number;
  backlog: number;
  keepAlive: boolean;
  idleTimeout: number;
  handlerTimeout: number;
  executor: Executor;
  logger: Logger;
}

/**
 * Validates options against the settings schema plus any transport-specific
 * `extensions`, and fills in defaults. Unknown keys are rejected.
 */
export function resolveConfig(options: ServerOptions, extensions: TProperties = {}): ResolvedConfig {
  const schema = Type.Object(
    {
      ...ServerSettings.properties,
      executor: Type.Optional(Type.Unknown()),
      logger: Type.Optional(Type.Unknown()),
      ...extensions,
    },
    { additionalProperties: false }
  );
  const checker = TypeCompiler.Compile(schema);
  const issues = [...checker.Errors(options)].map(
    (error) => `${error.path || '/'}: ${error.message}`
  );
  if (issues.length > 0) throw new ConfigError('Invalid server options', issues);

  if (options.executor !== undefined && !(options.executor instanceof Executor)) {
    throw new ConfigError('Invalid server options', ['/executor: Expected an Executor']);
  }

  return {
    host: options.host ?? DEFAULT_HOST,
    port: options.port ?? DEFAULT_PORT,
    chunkSize: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
    inbuf: options.inbuf ?? DEFAULT_CAPACITY,
    backlog: options.backlog ?? DEFAULT_BACKLOG,
    keepAlive: options.keepAlive ?? false,
    idleTimeout: options.idleTimeout ?? DEFAULT_IDLE_TIMEOUT,
    handlerTimeout: options.handlerTimeout ?? 0,
    executor: options.executor ?? new Executor(options.workers ?? DEFAULT_WORKERS),
    logger: options.logger ?? createLogger(options.logLevel),
  };
}
