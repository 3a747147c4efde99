import net from "net";
import { EventEmitter } from "events";

import { ConnectionClosedError } from "./connection";
import { FrameDecoder, StreamAssembler, type Frame } from "./frame-protocol";
import { parseHeaderLines } from "./http-utils";
import { STREAM_ID_HEADER } from "./request-parser";

const MAX_STREAM_ID = 0xffffffff;

export type ParsedHttpResponse = {
  version: string;
  status: number;
  statusText: string;
  /** lower-cased names */
  headers: Record<string, string>;
  body: Buffer;
};

export function parseHttpResponse(raw: Buffer): ParsedHttpResponse {
  const headEnd = raw.indexOf("\r\n\r\n");
  if (headEnd === -1) {
    throw new Error("response head is incomplete");
  }

  const [statusLine, ...lines] = raw.subarray(0, headEnd).toString("latin1").split("\r\n");
  const match = /^(HTTP\/\d\.\d) (\d{3}) ?(.*)$/.exec(statusLine);
  if (!match) {
    throw new Error(`invalid status line: ${statusLine}`);
  }

  return {
    version: match[1],
    status: Number(match[2]),
    statusText: match[3],
    headers: parseHeaderLines(lines),
    body: raw.subarray(headEnd + 4),
  };
}

export type MuxRequestOptions = {
  method?: string;
  version?: string;
  /** extra header lines, sent in insertion order */
  headers?: Record<string, string>;
};

export type MuxResponse = ParsedHttpResponse & {
  streamId: number;
  /** reassembled stream bytes */
  raw: Buffer;
  /** number of frames the stream arrived in */
  frames: number;
};

type PendingStream = {
  frames: number;
  resolve: (response: MuxResponse) => void;
  reject: (err: Error) => void;
};

/**
 * Client side of the multiplexed protocol: sends `STREAM-ID` tagged
 * requests over one connection and reassembles the length-prefixed frames
 * of each stream independently.
 *
 * Emits `frame` for every decoded frame (in wire order).
 */
export class MuxClient extends EventEmitter {
  private readonly decoder = new FrameDecoder();
  private readonly assembler = new StreamAssembler();
  private readonly pending = new Map<number, PendingStream>();
  private nextStreamId = 1;
  private closed = false;

  private constructor(private readonly socket: net.Socket) {
    super();

    socket.on("data", (chunk: Buffer) => {
      try {
        this.decoder.push(chunk, (frame) => this.handleFrame(frame));
      } catch (err) {
        this.failAll(err instanceof Error ? err : new Error(String(err)));
        socket.destroy();
      }
    });
    socket.on("error", (err) => {
      this.failAll(err);
    });
    socket.on("close", () => {
      this.closed = true;
      this.failAll(new ConnectionClosedError("connection closed before stream ended"));
    });
  }

  static connect(port: number, host = "127.0.0.1"): Promise<MuxClient> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });
      socket.once("error", reject);
      socket.once("connect", () => {
        socket.off("error", reject);
        resolve(new MuxClient(socket));
      });
    });
  }

  get openStreams(): number {
    return this.pending.size;
  }

  /** stream ids the frame assembler still holds state for */
  get trackedStreams(): number {
    return this.assembler.trackedStreams;
  }

  /**
   * Send one request on a new stream. Several requests may be outstanding;
   * each promise settles when its own end frame arrives.
   */
  request(path: string, options: MuxRequestOptions = {}): Promise<MuxResponse> {
    if (this.closed) {
      return Promise.reject(new ConnectionClosedError());
    }
    const streamId = this.allocateStreamId();

    let head = `${options.method ?? "GET"} ${path} ${options.version ?? "HTTP/1.1"}\r\n`;
    head += `${STREAM_ID_HEADER}: ${streamId}\r\n`;
    for (const [name, value] of Object.entries(options.headers ?? {})) {
      head += `${name}: ${value}\r\n`;
    }
    head += "\r\n";

    return new Promise((resolve, reject) => {
      this.pending.set(streamId, { frames: 0, resolve, reject });
      this.socket.write(head);
    });
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    this.socket.end();
  }

  private allocateStreamId(): number {
    let attempts = 0;
    while (this.pending.has(this.nextStreamId)) {
      this.nextStreamId = this.nextStreamId >= MAX_STREAM_ID ? 1 : this.nextStreamId + 1;
      attempts += 1;
      if (attempts > MAX_STREAM_ID) {
        throw new Error("no stream ids available");
      }
    }
    const id = this.nextStreamId;
    this.nextStreamId = id >= MAX_STREAM_ID ? 1 : id + 1;
    return id;
  }

  private handleFrame(frame: Frame) {
    this.emit("frame", frame);
    const stream = this.pending.get(frame.streamId);
    if (!stream) return;
    stream.frames += 1;

    const raw = this.assembler.push(frame);
    if (raw === null) return;

    this.pending.delete(frame.streamId);
    // Frames for streams without a pending request are dropped above, so the
    // ended id need not be remembered.
    this.assembler.release(frame.streamId);
    try {
      stream.resolve({
        ...parseHttpResponse(raw),
        streamId: frame.streamId,
        raw,
        frames: stream.frames,
      });
    } catch (err) {
      stream.reject(err instanceof Error ? err : new Error(String(err)));
    }
  }

  private failAll(err: Error) {
    for (const stream of this.pending.values()) {
      stream.reject(err);
    }
    this.pending.clear();
  }
}
