import net from "net";

import type { ResponseBody } from "./connection";
import { createResponse, serializeResponse } from "./http-response";
import { MAX_HTTP_HEADER_BYTES, parseContentLength, parseHeaderLines } from "./http-utils";
import {
  SUPPORTED_HTTP_VERSION,
  serializeRequestHead,
  type HttpRequest,
} from "./request-parser";

export const DEFAULT_RELAY_READ_SIZE = 4096;
export const DEFAULT_UPSTREAM_TIMEOUT_MS = 10_000;

export type OriginAddress = {
  host: string;
  port: number;
};

export type OriginResolver = (hostHeader: string | undefined) => OriginAddress;

/**
 * Parse a `Host` header value (`name`, `name:port`, `[v6]:port`).
 */
export function parseHostHeader(raw: string, defaultPort = 80): OriginAddress | null {
  const value = raw.trim();
  if (!value) return null;

  const bracketed = /^\[([0-9a-fA-F:.]+)\](?::(\d+))?$/.exec(value);
  if (bracketed) {
    const port = bracketed[2] === undefined ? defaultPort : Number(bracketed[2]);
    return isValidPort(port) ? { host: bracketed[1], port } : null;
  }

  const plain = /^([^\s:/]+)(?::(\d+))?$/.exec(value);
  if (!plain) return null;
  const port = plain[2] === undefined ? defaultPort : Number(plain[2]);
  return isValidPort(port) ? { host: plain[1], port } : null;
}

function isValidPort(port: number) {
  return Number.isInteger(port) && port > 0 && port <= 0xffff;
}

const LOOPBACK_HOSTS = new Set(["localhost", "127.0.0.1", "::1", "0.0.0.0", "::"]);

export type OriginResolverOptions = {
  /** origin used when `Host` is absent, unparsable or names the proxy */
  defaultOrigin: OriginAddress;
  /** the proxy's own listen address, never used as an origin */
  self?: () => OriginAddress | null;
};

export function createOriginResolver(options: OriginResolverOptions): OriginResolver {
  return (hostHeader) => {
    const parsed = hostHeader === undefined ? null : parseHostHeader(hostHeader);
    if (!parsed) return options.defaultOrigin;

    const self = options.self?.() ?? null;
    if (
      self &&
      parsed.port === self.port &&
      (parsed.host === self.host || LOOPBACK_HOSTS.has(parsed.host.toLowerCase()))
    ) {
      return options.defaultOrigin;
    }

    return parsed;
  };
}

/**
 * Finds where one upstream response ends inside the relayed bytes: at the
 * close, after `Content-Length` body bytes, or right after the head for
 * responses that never carry a body.
 */
export class ResponseBoundary {
  private head = Buffer.alloc(0);
  private headDone = false;
  private remaining = Number.POSITIVE_INFINITY;

  constructor(private readonly requestMethod: string) {}

  get complete(): boolean {
    return this.headDone && this.remaining === 0;
  }

  /** returns the part of `chunk` that belongs to the response */
  consume(chunk: Buffer): Buffer {
    if (this.complete) return Buffer.alloc(0);

    if (!this.headDone) {
      const searchFrom = Math.max(0, this.head.length - 3);
      this.head = Buffer.concat([this.head, chunk]);
      const end = this.head.indexOf("\r\n\r\n", searchFrom);
      if (end === -1) {
        // Oversized or binary head: relay everything until close.
        if (this.head.length > MAX_HTTP_HEADER_BYTES) {
          this.headDone = true;
          this.head = Buffer.alloc(0);
        }
        return chunk;
      }

      this.headDone = true;
      const headBytes = end + 4;
      this.remaining = this.bodyLength(this.head.subarray(0, end).toString("latin1"));
      const bodyInHead = this.head.length - headBytes;
      const alreadyForwarded = this.head.length - chunk.length;
      this.head = Buffer.alloc(0);

      const take = Math.min(bodyInHead, this.remaining);
      this.remaining -= take;
      return chunk.subarray(0, headBytes + take - alreadyForwarded);
    }

    const take = Math.min(chunk.length, this.remaining);
    this.remaining -= take;
    return take === chunk.length ? chunk : chunk.subarray(0, take);
  }

  private bodyLength(headText: string): number {
    const [statusLine, ...lines] = headText.split("\r\n");
    const status = Number(statusLine.split(" ")[1]);
    if (this.requestMethod === "HEAD" || status === 204 || status === 304) {
      return 0;
    }
    const length = parseContentLength(parseHeaderLines(lines)["content-length"]);
    return length ?? Number.POSITIVE_INFINITY;
  }
}

/** a connected upstream socket and the first error it reported */
type Upstream = {
  socket: net.Socket;
  failure: Error | null;
};

export type ForwardingRelayOptions = {
  resolveOrigin: OriginResolver;
  /** largest chunk handed back per read in `bytes` */
  readSize?: number;
  /** connect and inactivity deadline for the upstream socket in `ms` */
  upstreamTimeoutMs?: number;
  onDebug?: (message: string) => void;
  onError?: (error: Error, request: HttpRequest) => void;
};

/**
 * Forwards each request over its own upstream connection and hands back the
 * origin's response bytes untouched.
 */
export class ForwardingRelay {
  private readonly readSize: number;
  private readonly upstreamTimeoutMs: number;

  constructor(private readonly options: ForwardingRelayOptions) {
    this.readSize = options.readSize ?? DEFAULT_RELAY_READ_SIZE;
    this.upstreamTimeoutMs = options.upstreamTimeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS;
    if (!Number.isInteger(this.readSize) || this.readSize <= 0) {
      throw new RangeError(`relay read size must be > 0 (got ${this.readSize})`);
    }
  }

  async handle(request: HttpRequest): Promise<ResponseBody> {
    // Decided locally: no upstream connection is opened.
    if (request.version !== SUPPORTED_HTTP_VERSION) {
      return serializeResponse(createResponse(505));
    }

    const origin = this.options.resolveOrigin(request.headers["host"]);
    let upstream: Upstream;
    try {
      upstream = await this.connect(origin);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.options.onDebug?.(`connect ${origin.host}:${origin.port} failed: ${error.message}`);
      this.options.onError?.(error, request);
      return serializeResponse(createResponse(502));
    }

    this.options.onDebug?.(`${request.method} ${request.path} -> ${origin.host}:${origin.port}`);
    upstream.socket.write(serializeRequestHead(request));
    return this.relayResponse(upstream, request);
  }

  private connect(origin: OriginAddress): Promise<Upstream> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: origin.host, port: origin.port });

      const fail = (err: Error) => {
        socket.off("connect", onConnect);
        socket.destroy();
        reject(err);
      };
      const onTimeout = () => {
        fail(new Error(`connect timed out after ${this.upstreamTimeoutMs}ms`));
      };
      const onConnect = () => {
        socket.off("error", fail);
        socket.off("timeout", onTimeout);

        // The body may be read much later (the client side waits for its
        // write lock), so errors are recorded from here on.
        const upstream: Upstream = { socket, failure: null };
        socket.on("error", (err: Error) => {
          if (!upstream.failure) upstream.failure = err;
        });
        socket.on("timeout", () => {
          socket.destroy(new Error(`upstream idle for ${this.upstreamTimeoutMs}ms`));
        });
        resolve(upstream);
      };

      socket.setTimeout(this.upstreamTimeoutMs);
      socket.once("timeout", onTimeout);
      socket.once("error", fail);
      socket.once("connect", onConnect);
    });
  }

  private async *relayResponse(
    upstream: Upstream,
    request: HttpRequest,
  ): AsyncGenerator<Buffer, void, undefined> {
    const boundary = new ResponseBoundary(request.method);
    let relayed = 0;

    try {
      for await (const data of upstream.socket) {
        const chunk = boundary.consume(Buffer.isBuffer(data) ? data : Buffer.from(String(data)));
        for (let offset = 0; offset < chunk.length; offset += this.readSize) {
          const slice = chunk.subarray(offset, offset + this.readSize);
          relayed += slice.length;
          yield slice;
        }
        if (boundary.complete) break;
      }
    } catch (err) {
      if (!upstream.failure) {
        upstream.failure = err instanceof Error ? err : new Error(String(err));
      }
    } finally {
      upstream.socket.destroy();
    }

    const failure = upstream.failure;
    if (failure) {
      this.options.onDebug?.(`upstream failed after ${relayed} bytes: ${failure.message}`);
      this.options.onError?.(failure, request);
    }

    // Nothing reached the client yet, so it can still get a status line.
    if (relayed === 0) {
      yield serializeResponse(createResponse(502));
    }
  }
}
