import { STATUS_CODES } from 'node:http';
import {
  ProtocolError,
  type HttpVersion,
  type InboundFrame,
  type OutboundFrame,
  type RequestHead,
} from '@sluice/server';

export const MAX_INITIAL_LINE_LENGTH = 4096;
export const MAX_HEADER_SIZE = 8192;
const MAX_CHUNK_SIZE_LINE = 1024;

const CRLF = Buffer.from('\r\n');
const HEAD_END = Buffer.from('\r\n\r\n');
const REQUEST_LINE = /^([!#$%&'*+.^_`|~0-9A-Za-z-]+) (\S+) HTTP\/(\d+\.\d+)$/;
const HEADER_LINE = /^([!#$%&'*+.^_`|~0-9A-Za-z-]+):[ \t]*(.*?)[ \t]*$/;
const HEX = /^[0-9A-Fa-f]{1,12}$/;

// growable byte queue; `data.length` is capacity
type DynBuf = {
  data: Buffer;
  start: number;
  length: number;
};

function bufPush(buf: DynBuf, data: Buffer): void {
  const reqLen = buf.start + buf.length + data.length;
  if (reqLen > buf.data.length) {
    if (buf.length + data.length <= buf.data.length) {
      buf.data.copyWithin(0, buf.start, buf.start + buf.length);
    } else {
      let cap = Math.max(buf.data.length, 32);
      while (buf.length + data.length > cap) {
        cap *= 2;
      }
      const grown = Buffer.alloc(cap);
      buf.data.copy(grown, 0, buf.start, buf.start + buf.length);
      buf.data = grown;
    }
    buf.start = 0;
  }
  data.copy(buf.data, buf.start + buf.length, 0);
  buf.length += data.length;
}

function bufPop(buf: DynBuf, popLen: number): void {
  buf.start += popLen;
  buf.length -= popLen;
  if (buf.length === 0) buf.start = 0;
}

function bufView(buf: DynBuf): Buffer {
  return buf.data.subarray(buf.start, buf.start + buf.length);
}

/** Copies `len` bytes off the front of the buffer. */
function bufCut(buf: DynBuf, len: number): Buffer {
  const out = Buffer.from(buf.data.subarray(buf.start, buf.start + len));
  bufPop(buf, len);
  return out;
}

type DecoderState =
  | { kind: 'head' }
  | { kind: 'fixed'; remaining: number }
  | { kind: 'chunk-size' }
  | { kind: 'chunk-data'; remaining: number }
  | { kind: 'chunk-end' }
  | { kind: 'trailers'; size: number }
  | { kind: 'failed' };

export interface RequestDecoderOptions {
  /** Content frames carry at most this many bytes. */
  chunkSize: number;
  maxInitialLineLength?: number;
  maxHeaderSize?: number;
}

/**
 * Incremental HTTP/1.1 request decoder. Feed it socket data; it returns the
 * frames completed so far: a head frame per request, then content frames
 * with `last` set on the final one. Bodyless requests produce only the head.
 * Throws `ProtocolError` on malformed input, after which it stays failed.
 */
export class RequestDecoder {
  private readonly buf: DynBuf = { data: Buffer.alloc(0), start: 0, length: 0 };
  private state: DecoderState = { kind: 'head' };
  private readonly chunkSize: number;
  private readonly maxInitialLineLength: number;
  private readonly maxHeaderSize: number;

  constructor(options: RequestDecoderOptions) {
    this.chunkSize = options.chunkSize;
    this.maxInitialLineLength = options.maxInitialLineLength ?? MAX_INITIAL_LINE_LENGTH;
    this.maxHeaderSize = options.maxHeaderSize ?? MAX_HEADER_SIZE;
  }

  /** True between messages, with nothing buffered. */
  get idle(): boolean {
    return this.state.kind === 'head' && this.buf.length === 0;
  }

  push(data: Buffer): InboundFrame[] {
    if (this.state.kind === 'failed') throw new ProtocolError('Decoder already failed');
    bufPush(this.buf, data);
    const frames: InboundFrame[] = [];
    try {
      while (this.step(frames)) {
        // keep decoding while progress is made
      }
    } catch (error) {
      this.state = { kind: 'failed' };
      throw error;
    }
    return frames;
  }

  private step(frames: InboundFrame[]): boolean {
    const { state, buf } = this;
    switch (state.kind) {
      case 'head':
        return this.decodeHead(frames);
      case 'fixed': {
        const len = Math.min(state.remaining, buf.length, this.chunkSize);
        if (len === 0) return false;
        const remaining = state.remaining - len;
        frames.push({ kind: 'content', data: bufCut(buf, len), last: remaining === 0 });
        this.state = remaining === 0 ? { kind: 'head' } : { kind: 'fixed', remaining };
        return true;
      }
      case 'chunk-size': {
        const line = this.cutLine(MAX_CHUNK_SIZE_LINE, 'Chunk size line too long');
        if (line === null) return false;
        const size = line.split(';', 1)[0]?.trim() ?? '';
        if (!HEX.test(size)) throw new ProtocolError(`Invalid chunk size: ${size}`);
        const remaining = parseInt(size, 16);
        this.state =
          remaining === 0 ? { kind: 'trailers', size: 0 } : { kind: 'chunk-data', remaining };
        return true;
      }
      case 'chunk-data': {
        const len = Math.min(state.remaining, buf.length, this.chunkSize);
        if (len === 0) return false;
        const remaining = state.remaining - len;
        frames.push({ kind: 'content', data: bufCut(buf, len), last: false });
        this.state = remaining === 0 ? { kind: 'chunk-end' } : { kind: 'chunk-data', remaining };
        return true;
      }
      case 'chunk-end': {
        if (buf.length < CRLF.length) return false;
        if (!bufView(buf).subarray(0, CRLF.length).equals(CRLF)) {
          throw new ProtocolError('Missing CRLF after chunk data');
        }
        bufPop(buf, CRLF.length);
        this.state = { kind: 'chunk-size' };
        return true;
      }
      case 'trailers': {
        const line = this.cutLine(this.maxHeaderSize - state.size, 'Trailer section too large');
        if (line === null) return false;
        if (line.length > 0) {
          this.state = { kind: 'trailers', size: state.size + line.length + CRLF.length };
          return true;
        }
        frames.push({ kind: 'content', data: new Uint8Array(0), last: true });
        this.state = { kind: 'head' };
        return true;
      }
      case 'failed':
        return false;
    }
  }

  private cutLine(limit: number, tooLong: string): string | null {
    const view = bufView(this.buf);
    const end = view.indexOf(CRLF);
    if (end < 0) {
      if (view.length > limit) throw new ProtocolError(tooLong);
      return null;
    }
    if (end > limit) throw new ProtocolError(tooLong);
    const line = view.toString('latin1', 0, end);
    bufPop(this.buf, end + CRLF.length);
    return line;
  }

  private decodeHead(frames: InboundFrame[]): boolean {
    const { buf } = this;
    // tolerate empty lines before the request line
    while (buf.length >= CRLF.length && bufView(buf).subarray(0, CRLF.length).equals(CRLF)) {
      bufPop(buf, CRLF.length);
    }
    const view = bufView(buf);
    const end = view.indexOf(HEAD_END);
    const limit = this.maxInitialLineLength + this.maxHeaderSize;
    if (end < 0) {
      const firstLine = view.indexOf(CRLF);
      if ((firstLine < 0 ? view.length : firstLine) > this.maxInitialLineLength) {
        throw new ProtocolError('Request line too long');
      }
      if (view.length > limit) throw new ProtocolError('Request head too large');
      return false;
    }
    if (end > limit) throw new ProtocolError('Request head too large');

    const text = view.toString('latin1', 0, end);
    bufPop(buf, end + HEAD_END.length);
    const head = parseHead(text, this.maxInitialLineLength);
    frames.push({ kind: 'head', head: head.head });
    if (head.chunked) {
      this.state = { kind: 'chunk-size' };
    } else if (head.length > 0) {
      this.state = { kind: 'fixed', remaining: head.length };
    }
    return true;
  }
}

function parseHead(
  text: string,
  maxInitialLineLength: number
): { head: RequestHead; chunked: boolean; length: number } {
  const [requestLine = '', ...lines] = text.split('\r\n');
  if (requestLine.length > maxInitialLineLength) throw new ProtocolError('Request line too long');
  const match = REQUEST_LINE.exec(requestLine);
  if (!match) throw new ProtocolError('Malformed request line');
  const [, method = '', uri = '', version = ''] = match;

  const headers = new Headers();
  for (const line of lines) {
    const header = HEADER_LINE.exec(line);
    if (!header) throw new ProtocolError('Malformed header line');
    const [, name = '', value = ''] = header;
    try {
      headers.append(name, value);
    } catch (error) {
      throw new ProtocolError(`Invalid header: ${name}`, { cause: error });
    }
  }

  const transferEncoding = headers.get('transfer-encoding');
  const contentLength = headers.get('content-length');
  let chunked = false;
  let length = 0;
  if (transferEncoding !== null) {
    if (contentLength !== null) {
      throw new ProtocolError('Both Transfer-Encoding and Content-Length present');
    }
    const codings = transferEncoding.split(',').map((coding) => coding.trim().toLowerCase());
    if (codings[codings.length - 1] !== 'chunked') {
      throw new ProtocolError(`Unsupported transfer coding: ${transferEncoding}`);
    }
    chunked = true;
  } else if (contentLength !== null) {
    length = parseContentLength(contentLength);
  }

  return {
    head: {
      method,
      uri,
      version: parseVersion(version),
      headers,
      hasBody: chunked || length > 0,
    },
    chunked,
    length,
  };
}

function parseVersion(version: string): HttpVersion {
  if (version === '1.0' || version === '1.1') return version;
  throw new ProtocolError(`Unsupported HTTP version: ${version}`);
}

function parseContentLength(value: string): number {
  const values = new Set(value.split(',').map((part) => part.trim()));
  if (values.size !== 1) throw new ProtocolError(`Conflicting Content-Length: ${value}`);
  const [only = ''] = values;
  if (!/^\d{1,15}$/.test(only)) throw new ProtocolError(`Invalid Content-Length: ${value}`);
  return Number(only);
}

/**
 * Serialises outbound frames. Remembers whether the last head selected
 * chunked transfer coding so that content frames are framed to match.
 */
export class ResponseEncoder {
  private chunked = false;

  encode(frame: OutboundFrame): Buffer {
    switch (frame.kind) {
      case 'continue':
        return Buffer.from(`HTTP/${frame.version} 100 Continue\r\n\r\n`, 'latin1');
      case 'head': {
        const { version, status, headers, chunked } = frame.head;
        this.chunked = chunked;
        let head = `HTTP/${version} ${status} ${STATUS_CODES[status] ?? 'Unknown'}\r\n`;
        for (const [name, value] of headers) {
          head += `${name}: ${value}\r\n`;
        }
        return Buffer.from(`${head}\r\n`, 'latin1');
      }
      case 'content':
        return this.encodeContent(frame.data, frame.last);
    }
  }

  private encodeContent(data: Uint8Array, last: boolean): Buffer {
    if (!this.chunked) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    const parts: Uint8Array[] = [];
    if (data.byteLength > 0) {
      parts.push(Buffer.from(`${data.byteLength.toString(16)}\r\n`, 'latin1'), data, CRLF);
    }
    if (last) {
      parts.push(Buffer.from('0\r\n\r\n', 'latin1'));
      this.chunked = false;
    }
    return Buffer.concat(parts);
  }
}
