export type HttpVersion = '1.0' | '1.1';

export interface RequestHead {
  method: string;
  uri: string;
  version: HttpVersion;
  headers: Headers;
  /** False when the head declares no body, in which case no content frame follows. */
  hasBody: boolean;
}

export interface ResponseHead {
  version: HttpVersion;
  status: number;
  headers: Headers;
  /** Content frames that follow use chunked transfer coding. */
  chunked: boolean;
}

export type InboundFrame =
  | { kind: 'head'; head: RequestHead }
  | { kind: 'content'; data: Uint8Array; last: boolean };

export type OutboundFrame =
  | { kind: 'continue'; version: HttpVersion }
  | { kind: 'head'; head: ResponseHead }
  | { kind: 'content'; data: Uint8Array; last: boolean };

export interface ConnectionInfo {
  id: string;
  secure: boolean;
  remoteAddress?: string;
  remotePort?: number;
  localAddress?: string;
  localPort?: number;
}

/**
 * Handle on one transport connection. Every component that talks to the
 * peer receives it explicitly.
 */
export interface Connection {
  readonly info: ConnectionInfo;
  /** Resolves when the frame has been handed to the transport, rejects with a `TransportError`. */
  write(frame: OutboundFrame): Promise<void>;
  /** Stop delivering inbound data until `resume()`. */
  pause(): void;
  resume(): void;
  close(): void;
}

/** What a transport drives for each of its connections. */
export interface ConnectionHandler {
  onData(frame: InboundFrame): void;
  /** The peer has finished sending; no more frames follow. */
  onEnd(): void;
  onError(error: Error): void;
  onClose(): void;
}
