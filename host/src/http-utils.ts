export const MAX_HTTP_HEADER_BYTES = 64 * 1024;

const HEADER_TERMINATOR = [0x0d, 0x0a, 0x0d, 0x0a];

/**
 * A failure that should reach the peer as a well-formed status line.
 */
export class HttpResponseError extends Error {
  status: number;
  statusText: string;

  constructor(
    message = "internal server error",
    status = 500,
    statusText = "Internal Server Error",
  ) {
    super(message);
    this.name = "HttpResponseError";
    this.status = status;
    this.statusText = statusText;
  }
}

/**
 * Parse `name: value` lines into a record keyed by lower-cased name.
 *
 * Duplicate names keep the last value. Lines without a colon or with an
 * empty name are reported through `onInvalid` and skipped.
 */
export function parseHeaderLines(
  lines: Iterable<string>,
  onInvalid?: (line: string) => void,
): Record<string, string> {
  const headers: Record<string, string> = {};

  for (const line of lines) {
    if (!line) continue;
    const idx = line.indexOf(":");
    if (idx === -1) {
      onInvalid?.(line);
      continue;
    }

    const key = line.slice(0, idx).trim().toLowerCase();
    if (!key) {
      onInvalid?.(line);
      continue;
    }

    headers[key] = line.slice(idx + 1).trim();
  }

  return headers;
}

export function parseContentLength(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  if (!/^\s*\d+\s*$/.test(raw)) return null;
  const n = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(n) || n < 0) {
    return null;
  }
  return n;
}

export class HttpReceiveBuffer {
  private readonly chunks: Buffer[] = [];
  private totalBytes = 0;

  get length() {
    return this.totalBytes;
  }

  append(chunk: Buffer) {
    if (chunk.length === 0) return;
    this.chunks.push(chunk);
    this.totalBytes += chunk.length;
  }

  resetTo(buffer: Buffer) {
    this.chunks.length = 0;
    this.totalBytes = 0;
    this.append(buffer);
  }

  /**
   * Find the start offset of the first "\r\n\r\n" sequence or -1 if missing
   */
  findHeaderEnd(maxSearchBytes: number): number {
    let matched = 0;
    let index = 0;

    for (const chunk of this.chunks) {
      for (let i = 0; i < chunk.length; i += 1) {
        if (index >= maxSearchBytes) return -1;
        const b = chunk[i];

        if (b === HEADER_TERMINATOR[matched]) {
          matched += 1;
          if (matched === HEADER_TERMINATOR.length) {
            return index - (HEADER_TERMINATOR.length - 1);
          }
        } else {
          // Only possible overlap is a new '\r'.
          matched = b === HEADER_TERMINATOR[0] ? 1 : 0;
        }

        index += 1;
      }
    }

    return -1;
  }

  /**
   * Removes and returns the first message head (without its terminator), or
   * null when no complete head is buffered yet.
   */
  shiftHead(maxHeadBytes: number): Buffer | null {
    const end = this.findHeaderEnd(maxHeadBytes + HEADER_TERMINATOR.length);
    if (end === -1) {
      if (this.totalBytes > maxHeadBytes + HEADER_TERMINATOR.length) {
        throw new HttpResponseError(
          `request head exceeds ${maxHeadBytes} bytes`,
          431,
          "Request Header Fields Too Large",
        );
      }
      return null;
    }

    const all = this.toBuffer();
    const head = all.subarray(0, end);
    this.resetTo(all.subarray(end + HEADER_TERMINATOR.length));
    return head;
  }

  toBuffer(): Buffer {
    if (this.chunks.length === 0) return Buffer.alloc(0);
    if (this.chunks.length === 1) return this.chunks[0];
    return Buffer.concat(this.chunks, this.totalBytes);
  }
}
