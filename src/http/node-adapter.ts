/**
 * Bridges node:http messages and the fetch-style app.
 *
 * Request bodies are read up to a byte limit; past it the read stops and
 * the caller answers 413.
 */

import type { IncomingHttpHeaders, ServerResponse } from 'node:http';
import { InvalidInputError } from '../domain/errors.js';

export const MAX_BODY_BYTES = 1024 * 1024;

/**
 * The parts of an IncomingMessage the adapter reads.
 */
export interface IncomingLike extends AsyncIterable<unknown> {
  url?: string;
  method?: string;
  headers: IncomingHttpHeaders;
}

export class BodyTooLargeError extends InvalidInputError {
  constructor(limit: number) {
    super('payload_too_large', `Request body exceeds ${limit} bytes`);
    this.name = 'BodyTooLargeError';
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk));
}

export async function readBody(req: IncomingLike, limit = MAX_BODY_BYTES): Promise<Buffer> {
  const declared = Number(req.headers['content-length']);
  if (Number.isFinite(declared) && declared > limit) {
    throw new BodyTooLargeError(limit);
  }

  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = toBuffer(chunk);
    size += buffer.length;
    if (size > limit) {
      throw new BodyTooLargeError(limit);
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks);
}

export async function toRequest(
  req: IncomingLike,
  port: number,
  limit = MAX_BODY_BYTES
): Promise<Request> {
  const url = new URL(req.url ?? '/', `http://${req.headers.host ?? `localhost:${port}`}`);
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const v of value) headers.append(key, v);
    } else if (value !== undefined) {
      headers.set(key, value);
    }
  }

  const method = req.method ?? 'GET';
  if (method === 'GET' || method === 'HEAD') {
    return new Request(url, { method, headers });
  }
  return new Request(url, { method, headers, body: await readBody(req, limit) });
}

export async function writeResponse(response: Response, res: ServerResponse): Promise<void> {
  const headers: Record<string, string | string[]> = {};
  response.headers.forEach((value, key) => {
    const existing = headers[key];
    if (existing === undefined) {
      headers[key] = value;
    } else {
      headers[key] = Array.isArray(existing) ? [...existing, value] : [existing, value];
    }
  });

  res.writeHead(response.status, headers);
  res.end(Buffer.from(await response.arrayBuffer()));
}
