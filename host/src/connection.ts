import { EventEmitter } from "events";
import type { Duplex } from "stream";

import { AsyncMutex } from "./async-utils";
import type { DebugComponent } from "./debug";
import { stripTrailingNewline } from "./debug";
import {
  encodeFrame,
  frameResponse,
  frameStream,
  MAX_FRAME_PAYLOAD,
  type Frame,
  type FrameEncoding,
} from "./frame-protocol";
import {
  createErrorResponse,
  createResponse,
  serializeResponse,
} from "./http-response";
import { HttpReceiveBuffer, HttpResponseError, MAX_HTTP_HEADER_BYTES } from "./http-utils";
import { MalformedRequestError, parseRequest, type HttpRequest } from "./request-parser";

export type ConnectionState = "open" | "closing" | "closed";

/** serialized response bytes, whole or as they become available */
export type ResponseBody = Buffer | AsyncIterable<Buffer>;

export type RequestHandler = (request: HttpRequest) => Promise<ResponseBody>;

/**
 * Transport the handler owns. `net.Socket` satisfies it; tests may pass any
 * duplex stream.
 */
export type ConnectionSocket = Duplex & {
  setTimeout?: (timeout: number, callback?: () => void) => unknown;
  remoteAddress?: string;
  remotePort?: number;
};

export type ConnectionOptions = {
  /** connection id used in debug output */
  id?: number;
  /** wire encoding for multiplexed responses */
  frameEncoding?: FrameEncoding;
  /** frame payload size in `bytes` (max 1024) */
  maxFramePayload?: number;
  /** maximum request head size in `bytes` */
  maxHeadBytes?: number;
  /** close after this many `ms` without socket activity (0 = never) */
  idleTimeoutMs?: number;
};

export class ConnectionClosedError extends Error {
  constructor(message = "connection closed") {
    super(message);
    this.name = "ConnectionClosedError";
  }
}

/**
 * Owns one accepted connection.
 *
 * Every request head read off the socket runs as its own worker. Workers
 * run concurrently; their output shares the socket through a single write
 * lock held for exactly one frame, or one whole non-framed response.
 *
 * Events:
 * - `debug` (component, message)
 * - `log` (line)
 * - `request_error` (error, request?) when a worker fails
 * - `close` once all workers finished and the transport is released
 */
export class ConnectionHandler extends EventEmitter {
  readonly id: number;
  private readonly receiveBuffer = new HttpReceiveBuffer();
  private readonly writeLock = new AsyncMutex();
  private readonly frameEncoding: FrameEncoding;
  private readonly maxFramePayload: number;
  private readonly maxHeadBytes: number;

  private stateValue: ConnectionState = "open";
  private inflightWorkers = 0;
  private transportClosed = false;
  private readonly resolveClosed: () => void;

  /** resolves when the connection reaches `closed` */
  readonly closed: Promise<void>;

  constructor(
    private readonly socket: ConnectionSocket,
    private readonly handler: RequestHandler,
    options: ConnectionOptions = {},
  ) {
    super();
    this.id = options.id ?? 0;
    this.frameEncoding = options.frameEncoding ?? "length-prefixed";
    this.maxFramePayload = options.maxFramePayload ?? MAX_FRAME_PAYLOAD;
    this.maxHeadBytes = options.maxHeadBytes ?? MAX_HTTP_HEADER_BYTES;
    let resolveClosed: () => void = () => {};
    this.closed = new Promise<void>((resolve) => {
      resolveClosed = () => resolve();
    });
    this.resolveClosed = resolveClosed;

    socket.on("data", (chunk: Buffer | string) => {
      this.handleData(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    });
    socket.on("end", () => {
      this.beginClose("peer closed its side");
    });
    socket.on("error", (err: Error) => {
      this.emitDebug("conn", `transport error: ${err.message}`);
      this.beginClose("transport error");
    });
    socket.on("close", () => {
      this.transportClosed = true;
      this.beginClose("transport closed");
      this.maybeFinishClose();
    });

    const idleTimeoutMs = options.idleTimeoutMs ?? 0;
    if (idleTimeoutMs > 0 && socket.setTimeout) {
      socket.setTimeout(idleTimeoutMs, () => {
        this.beginClose(`idle for ${idleTimeoutMs}ms`);
      });
    }
  }

  get state(): ConnectionState {
    return this.stateValue;
  }

  get inflight(): number {
    return this.inflightWorkers;
  }

  /** Stop reading and tear the transport down without waiting for workers. */
  destroy() {
    this.beginClose("destroyed");
    this.socket.destroy();
  }

  private emitDebug(component: DebugComponent, message: string) {
    const normalized = stripTrailingNewline(message);
    this.emit("debug", component, `#${this.id} ${normalized}`);
    this.emit("log", `[${component}] #${this.id} ${normalized}`);
  }

  private handleData(chunk: Buffer) {
    if (this.stateValue !== "open") return;
    this.receiveBuffer.append(chunk);

    while (this.stateValue === "open") {
      let head: Buffer | null;
      try {
        head = this.receiveBuffer.shiftHead(this.maxHeadBytes);
      } catch (err) {
        if (!(err instanceof HttpResponseError)) throw err;
        this.rejectConnection(err);
        return;
      }
      if (!head) return;
      this.dispatch(head);
    }
  }

  private rejectConnection(error: HttpResponseError) {
    this.emitDebug("http", `rejecting connection: ${error.message}`);
    this.trackWorker(
      this.writeWhole(serializeResponse(createErrorResponse(error.status, error.statusText))),
      undefined,
    );
    this.beginClose(error.message);
  }

  private dispatch(head: Buffer) {
    let request: HttpRequest;
    try {
      request = parseRequest(head);
    } catch (err) {
      if (!(err instanceof MalformedRequestError)) throw err;
      // Dropped without a response; later messages are still served.
      this.emitDebug("http", `dropping malformed request: ${err.message}`);
      return;
    }

    const stream = request.streamId === undefined ? "-" : String(request.streamId);
    this.emitDebug("http", `${request.method} ${request.path} ${request.version} stream=${stream}`);
    this.trackWorker(this.runWorker(request), request);
  }

  private trackWorker(work: Promise<void>, request: HttpRequest | undefined) {
    this.inflightWorkers += 1;
    void work
      .catch((err: unknown) => {
        const error = err instanceof Error ? err : new Error(String(err));
        this.emit("request_error", error, request);
        if (error instanceof ConnectionClosedError || !this.isWritable()) {
          this.beginClose(`write failed: ${error.message}`);
        }
      })
      .finally(() => {
        this.inflightWorkers -= 1;
        this.maybeFinishClose();
      });
  }

  private async runWorker(request: HttpRequest) {
    let body: ResponseBody;
    try {
      body = await this.handler(request);
    } catch (err) {
      this.emit("request_error", err instanceof Error ? err : new Error(String(err)), request);
      body = serializeResponse(createResponse(500));
    }

    if (request.streamId === undefined) {
      await this.writeWhole(body);
    } else {
      await this.writeFramed(request.streamId, body);
    }
  }

  private async writeWhole(body: ResponseBody) {
    if (Buffer.isBuffer(body)) {
      const whole = body;
      await this.writeLock.runExclusive(() => this.write(whole));
      return;
    }

    // A streamed non-framed response keeps the lock until its last byte so
    // nothing else lands inside it.
    const source = body;
    await this.writeLock.runExclusive(async () => {
      for await (const chunk of source) {
        await this.write(chunk);
      }
    });
  }

  private async writeFramed(streamId: number, body: ResponseBody) {
    const frames: Iterable<Frame> | AsyncIterable<Frame> = Buffer.isBuffer(body)
      ? frameResponse(streamId, body, this.maxFramePayload)
      : frameStream(streamId, body, this.maxFramePayload);

    let count = 0;
    for await (const frame of frames) {
      const encoded = encodeFrame(frame, this.frameEncoding);
      await this.writeLock.runExclusive(() => this.write(encoded));
      count += 1;
    }
    this.emitDebug("frame", `stream ${streamId} sent in ${count} frame(s)`);
  }

  private write(data: Buffer): Promise<void> {
    if (!this.isWritable()) {
      return Promise.reject(new ConnectionClosedError());
    }
    return new Promise((resolve, reject) => {
      this.socket.write(data, (err?: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private isWritable(): boolean {
    return !this.transportClosed && !this.socket.destroyed && this.socket.writable;
  }

  private beginClose(reason: string) {
    if (this.stateValue !== "open") return;
    this.stateValue = "closing";
    this.emitDebug("conn", `closing (${reason}), ${this.inflightWorkers} worker(s) in flight`);
    this.maybeFinishClose();
  }

  private maybeFinishClose() {
    if (this.stateValue !== "closing" || this.inflightWorkers > 0) return;
    this.stateValue = "closed";
    if (!this.transportClosed) {
      this.socket.end();
    }
    this.emitDebug("conn", "closed");
    this.emit("close");
    this.resolveClosed();
  }
}
