import { parseHeaderLines } from "./http-utils";

export const SUPPORTED_HTTP_VERSION = "HTTP/1.1";
export const STREAM_ID_HEADER = "STREAM-ID";

const MAX_STREAM_ID = 0xffffffff;
const STREAM_ID_LINE = /^STREAM-ID:\s*(\S*)\s*$/i;

export class MalformedRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedRequestError";
  }
}

export type HttpHeaderLine = readonly [name: string, value: string];

export type HttpRequest = {
  readonly method: string;
  readonly path: string;
  readonly version: string;
  /** lower-cased names, last value wins */
  readonly headers: Readonly<Record<string, string>>;
  /** header lines in arrival order with their original case */
  readonly headerLines: readonly HttpHeaderLine[];
  /** present only for multiplexed requests */
  readonly streamId?: number;
};

function parseStreamId(raw: string): number | undefined {
  if (!/^\d+$/.test(raw)) return undefined;
  const id = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(id) || id > MAX_STREAM_ID) return undefined;
  return id;
}

/**
 * Returns the stream id carried by a `STREAM-ID: <n>` line, null when the
 * line is not a stream id line and undefined when it is one with an unusable
 * value.
 */
function matchStreamIdLine(line: string): number | undefined | null {
  const match = STREAM_ID_LINE.exec(line);
  if (!match) return null;
  return parseStreamId(match[1]);
}

/**
 * Parse one request head (request line plus header block, without the blank
 * line terminator).
 *
 * A `STREAM-ID` line is accepted ahead of the request line as well as among
 * the headers; it never appears in the returned headers.
 */
export function parseRequest(head: Buffer | string): HttpRequest {
  const text = typeof head === "string" ? head : head.toString("latin1");
  const lines = text.split("\r\n");

  let streamId: number | undefined;
  let index = 0;

  // Leading stream id lines (and stray blank lines between pipelined
  // messages) come before the request line.
  while (index < lines.length) {
    const line = lines[index];
    if (line === "") {
      index += 1;
      continue;
    }
    const leading = matchStreamIdLine(line);
    if (leading === null) break;
    if (leading !== undefined) streamId = leading;
    index += 1;
  }

  const requestLine = lines[index];
  if (requestLine === undefined) {
    throw new MalformedRequestError("missing request line");
  }

  const tokens = requestLine.trim().split(/\s+/);
  if (tokens.length !== 3) {
    throw new MalformedRequestError(
      `request line must have 3 tokens (got ${tokens.length})`,
    );
  }
  const [method, path, version] = tokens;

  const headerLines: HttpHeaderLine[] = [];
  const kept: string[] = [];
  for (const line of lines.slice(index + 1)) {
    if (line === "") continue;

    const id = matchStreamIdLine(line);
    if (id !== null) {
      if (id !== undefined) streamId = id;
      continue;
    }

    const colon = line.indexOf(":");
    if (colon <= 0 || !line.slice(0, colon).trim()) {
      throw new MalformedRequestError(`invalid header line: ${line}`);
    }
    headerLines.push([line.slice(0, colon).trim(), line.slice(colon + 1).trim()]);
    kept.push(line);
  }

  return {
    method,
    path,
    version,
    headers: parseHeaderLines(kept),
    headerLines,
    ...(streamId !== undefined ? { streamId } : {}),
  };
}

export function serializeRequestHead(request: HttpRequest): Buffer {
  let head = `${request.method} ${request.path} ${request.version}\r\n`;
  for (const [name, value] of request.headerLines) {
    head += `${name}: ${value}\r\n`;
  }
  head += "\r\n";
  return Buffer.from(head, "latin1");
}
