import type { BodyChannel } from './channel';
import type { ConnectionInfo, HttpVersion, RequestHead } from './connection';
import { ProtocolError } from './errors';

export type RequestBody = BodyChannel;

export interface Request {
  type: 'request';
  method: string;
  /** Request target exactly as received. */
  uri: string;
  /** Decoded path of `url`. */
  path: string;
  url: URL;
  version: HttpVersion;
  headers: Headers;
  query: Record<string, string>;
  /** Absent when the head declared no body. */
  body?: RequestBody;
  /** The client sent `Expect: 100-continue` and waits before sending the body. */
  continueExpected: boolean;
  /** Writes `100 Continue` now. No-op when not expected, already sent or the body started. */
  sendContinue: () => void;
  connection: ConnectionInfo;
}

/** Synthetic request the handler receives after it failed on `request`. */
export interface ErrorRequest {
  type: 'error';
  method: 'error';
  error: Error;
  request: Request;
  connection: ConnectionInfo;
}

export interface BuildRequestOptions {
  body?: RequestBody;
  continueExpected: boolean;
  sendContinue: () => void;
  connection: ConnectionInfo;
}

export function buildRequest(head: RequestHead, options: BuildRequestOptions): Request {
  const url = requestUrl(head, options.connection);
  return {
    type: 'request',
    method: head.method,
    uri: head.uri,
    path: decodePath(url.pathname),
    url,
    version: head.version,
    headers: head.headers,
    query: Object.fromEntries(url.searchParams),
    body: options.body,
    continueExpected: options.continueExpected,
    sendContinue: options.sendContinue,
    connection: options.connection,
  };
}

function decodePath(pathname: string): string {
  try {
    return decodeURIComponent(pathname);
  } catch {
    return pathname;
  }
}

function requestUrl(head: RequestHead, connection: ConnectionInfo): URL {
  const scheme = connection.secure ? 'https' : 'http';
  const local = connection.localAddress?.includes(':')
    ? `[${connection.localAddress}]`
    : connection.localAddress;
  const host = head.headers.get('host') ?? local ?? 'localhost';
  try {
    if (head.uri === '*') return new URL(`${scheme}://${host}`);
    return new URL(head.uri, `${scheme}://${host}`);
  } catch (error) {
    throw new ProtocolError(`Invalid request target: ${head.uri}`, { cause: error });
  }
}
