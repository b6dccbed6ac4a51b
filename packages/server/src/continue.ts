import type { Connection, RequestHead } from './connection';
import { describeError, type Logger } from './logger';

export function expectsContinue(head: RequestHead): boolean {
  return (
    head.version === '1.1' &&
    head.hasBody &&
    head.headers.get('expect')?.trim().toLowerCase() === '100-continue'
  );
}

/**
 * One-shot `100 Continue` for a request head. `send` writes the interim
 * response at most once, and never after `settle()`, which the connection
 * calls when the first body chunk arrives or the final response starts.
 */
export class ContinueNegotiator {
  readonly expected: boolean;
  private settled: boolean;

  constructor(
    private readonly head: RequestHead,
    private readonly connection: Connection,
    private readonly logger: Logger
  ) {
    this.expected = expectsContinue(head);
    this.settled = !this.expected;
  }

  send = (): void => {
    if (this.settled) return;
    this.settled = true;
    this.connection.write({ kind: 'continue', version: this.head.version }).catch((error) => {
      this.logger.debug('interim response not written', {
        connection: this.connection.info.id,
        ...describeError(error),
      });
    });
  };

  settle(): void {
    this.settled = true;
  }
}
