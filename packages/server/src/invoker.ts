import { HandlerError } from './errors';
import type { Executor } from './executor';
import { describeError, type Logger } from './logger';
import type { ErrorRequest, Request } from './request';
import { isResponse, type Response } from './response';
import type { Handler } from './server';

export interface HandlerInvokerOptions {
  handler: Handler;
  executor: Executor;
  logger: Logger;
  /** Milliseconds before a pending handler is treated as failed; 0 disables. */
  timeout?: number;
}

/**
 * Runs the handler on the executor and settles on a single response.
 *
 * A handler that throws, rejects, times out or returns something that is not
 * a response is called once more with an `ErrorRequest`. Whatever response
 * that second call yields replaces the failed one and is sent with
 * `connection: close`; without one the caller closes the connection.
 * After a timeout that second call is not queued on the executor.
 */
export class HandlerInvoker {
  constructor(private readonly options: HandlerInvokerOptions) {}

  async invoke(request: Request): Promise<Response | undefined> {
    try {
      return await this.withTimeout(this.call(request));
    } catch (error) {
      const failure =
        error instanceof HandlerError
          ? error
          : new HandlerError('threw', 'Handler failed', { cause: error });
      this.options.logger.error('handler failed', {
        connection: request.connection.id,
        method: request.method,
        uri: request.uri,
        reason: failure.reason,
        ...describeError(failure.cause ?? failure),
      });
      return await this.recover(request, failure);
    }
  }

  private async call(request: Request): Promise<Response> {
    const { handler, executor } = this.options;
    const result = await executor.run(async () => {
      let value: unknown;
      try {
        value = handler(request);
      } catch (error) {
        throw new HandlerError('threw', 'Handler threw', { cause: error });
      }
      if (!isThenable(value)) return value;
      try {
        return await value;
      } catch (error) {
        throw new HandlerError('rejected', 'Handler rejected', { cause: error });
      }
    });
    if (!isResponse(result)) {
      throw new HandlerError('invalid-response', `Handler produced ${describeValue(result)}`);
    }
    return result;
  }

  private async recover(request: Request, error: HandlerError): Promise<Response | undefined> {
    const { handler, executor, logger } = this.options;
    const errorRequest: ErrorRequest = {
      type: 'error',
      method: 'error',
      error,
      request,
      connection: request.connection,
    };
    // A timed-out call still holds its executor slot, so the error request
    // runs in that slot's place instead of queueing behind it.
    const call = () => handler(errorRequest);
    try {
      const result = await (error.reason === 'timeout' ? direct(call) : executor.run(call));
      if (!isResponse(result)) return undefined;
      // a failed request never keeps its connection
      const headers = new Headers(result.headers);
      headers.set('connection', 'close');
      return { ...result, headers };
    } catch (secondary) {
      logger.error('error request failed', {
        connection: request.connection.id,
        ...describeError(secondary),
      });
      return undefined;
    }
  }

  private withTimeout<T>(promise: Promise<T>): Promise<T> {
    const timeout = this.options.timeout ?? 0;
    if (timeout <= 0) return promise;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new HandlerError('timeout', `Handler did not respond within ${timeout}ms`));
      }, timeout);
    });
    return Promise.race([promise, expired]).finally(() => clearTimeout(timer));
  }
}

async function direct<T>(task: () => T | PromiseLike<T>): Promise<T> {
  return await task();
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  if (typeof value === 'object') return 'an object that is not a response';
  return typeof value === 'undefined' ? 'no response' : `a ${typeof value}`;
}
