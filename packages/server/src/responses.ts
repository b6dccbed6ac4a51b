import type { HeaderInit, Response } from './response';
import { writeJson, writeText } from './stream';

export interface BufferedResponseInit<B> {
  status: number;
  body?: B;
  headers?: HeaderInit;
}

/** Builds a helper that encodes its body up front and labels it unless the caller already did. */
function buffered<B>(
  contentType: string,
  encode: (body: B) => Uint8Array | undefined
): (init: BufferedResponseInit<B>) => Response {
  return ({ status, body, headers: init }) => {
    const headers = new Headers(init);
    const bytes = body === undefined ? undefined : encode(body);
    if (bytes === undefined) return { status, headers };
    if (!headers.has('content-type')) headers.set('content-type', contentType);
    return { status, headers, body: bytes };
  };
}

export const json = buffered<unknown>('application/json', writeJson);
export const text = buffered<string>('text/plain; charset=utf-8', writeText);
export const html = buffered<string>('text/html; charset=utf-8', writeText);
