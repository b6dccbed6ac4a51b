import type { ErrorRequest, Request } from './request';
import type { Response } from './response';

export interface ListenOptions {
  host?: string;
  port?: number;
}

export interface Server {
  listen(options?: ListenOptions): Promise<RunningServer>;
}

export interface RunningServer {
  host: string;
  port: number;
  url: URL;
  stop(): Promise<void>;
}

/**
 * A handler answers a request with a response, or with a promise that yields
 * exactly one. For an `ErrorRequest` it may answer with a response to send
 * in place of the failed one, or with nothing to just close the connection.
 */
export type Handler = (request: Request | ErrorRequest) => HandlerResult;

export type HandlerResult =
  | Response
  | undefined
  | PromiseLike<Response | undefined>;
