import type { RequestBody } from './request';

export function writeText(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function writeJson(json: unknown): Uint8Array | undefined {
  if (json === undefined) return undefined;
  return writeText(JSON.stringify(json));
}

export async function readBytes(body: RequestBody): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let length = 0;
  for await (const chunk of body) {
    chunks.push(chunk);
    length += chunk.byteLength;
  }
  const bytes = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    bytes.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return bytes;
}

export async function readText(body: RequestBody, encoding = 'utf-8'): Promise<string> {
  const bytes = await readBytes(body);
  const decoder = new TextDecoder(encoding);
  return decoder.decode(bytes);
}

export async function readJson(body: RequestBody, encoding = 'utf-8'): Promise<unknown> {
  const text = await readText(body, encoding);
  return JSON.parse(text);
}
