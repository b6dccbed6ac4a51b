import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { BodyChannel } from './channel';

export type HeaderInit = Headers | Record<string, string> | [string, string][];

/** Absent, a single buffer (strings are sent as UTF-8), or a channel of further buffers. */
export type ResponseBody = Uint8Array | string | BodyChannel;

export interface Response {
  status: number;
  headers?: HeaderInit;
  body?: ResponseBody;
}

const ResponseShape = Type.Object({
  status: Type.Integer({ minimum: 100, maximum: 999 }),
  headers: Type.Optional(Type.Unknown()),
  body: Type.Optional(Type.Unknown()),
});

const responseShape = TypeCompiler.Compile(ResponseShape);

export function isResponse(value: unknown): value is Response {
  if (!responseShape.Check(value)) return false;
  const { headers, body } = value;
  const headersOk = headers === undefined || (typeof headers === 'object' && headers !== null);
  return headersOk && (body === undefined || isResponseBody(body));
}

function isResponseBody(body: unknown): body is ResponseBody {
  return typeof body === 'string' || body instanceof Uint8Array || body instanceof BodyChannel;
}
