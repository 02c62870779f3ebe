import { Buffer } from 'node:buffer';

/**
 * Snapshot of one completed HTTP exchange, as handed over by the executor.
 */
export interface ResponseDescriptor {
  readonly responseCode: number;
  readonly body: string;
  readonly numberOfLines: number;
  readonly numberOfWords: number;
  readonly contentLengthInBytes: number;
}

export interface RawResponse {
  responseCode: number;
  body?: string | null;
}

/**
 * Lines end at `\n`, `\r\n` or `\r`; a trailing terminator does not open
 * another line, so `"a\n"` is one line and `"\n"` is one empty line.
 */
export function countLines(body: string): number {
  if (body.length === 0) return 0;
  const lines = body.split(/\r\n|\r|\n/);
  return lines[lines.length - 1] === '' ? lines.length - 1 : lines.length;
}

export function countWords(body: string): number {
  const trimmed = body.trim();
  if (trimmed.length === 0) return 0;
  return trimmed.split(/\s+/).length;
}

/**
 * Builds a frozen descriptor, deriving line, word and UTF-8 byte counts from
 * the body.
 */
export function describeResponse(raw: RawResponse): ResponseDescriptor {
  const body = raw.body ?? '';
  return Object.freeze({
    responseCode: raw.responseCode,
    body,
    numberOfLines: countLines(body),
    numberOfWords: countWords(body),
    contentLengthInBytes: Buffer.byteLength(body, 'utf8'),
  });
}
