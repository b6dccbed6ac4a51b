/**
 * Socket failure or abrupt peer disconnect. Never retried and never shown to
 * the handler; the connection and its body channels are torn down.
 */
export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * Malformed or out-of-sequence input on a connection, such as body content
 * arriving with no open request. Fatal to that connection only.
 */
export class ProtocolError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

export type HandlerFailure = 'threw' | 'rejected' | 'invalid-response' | 'timeout';

/**
 * Raised at the handler invocation boundary. The handler receives it once
 * more as the `error` of an error pseudo-request.
 */
export class HandlerError extends Error {
  constructor(
    readonly reason: HandlerFailure,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'HandlerError';
  }
}

/**
 * Invalid server configuration. Thrown while the server is constructed so
 * that it never starts half-configured.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
    options?: ErrorOptions
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.name = 'ConfigError';
  }
}
