import net from "net";
import { EventEmitter } from "events";

import {
  ConnectionHandler,
  type ConnectionOptions,
  type ResponseBody,
} from "./connection";
import {
  debugFlagsToArray,
  parseDebugEnv,
  resolveDebugFlags,
  stripTrailingNewline,
  type DebugComponent,
  type DebugConfig,
  type DebugFlag,
} from "./debug";
import { MAX_FRAME_PAYLOAD, type FrameEncoding } from "./frame-protocol";
import { MAX_HTTP_HEADER_BYTES } from "./http-utils";
import type { HttpRequest } from "./request-parser";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_IDLE_TIMEOUT_MS = 30_000;

/**
 * listener options shared by the file server and the proxy
 */
export type ListenerOptions = {
  /** bind address */
  host?: string;
  /** bind port (0 = ephemeral) */
  port?: number;
  /** wire encoding for multiplexed responses */
  frameEncoding?: FrameEncoding;
  /** frame payload size in `bytes` (1..1024) */
  maxFramePayload?: number;
  /** maximum request head size in `bytes` */
  maxHeadBytes?: number;
  /** per-connection inactivity deadline in `ms` (0 = none) */
  idleTimeoutMs?: number;
  /**
   * Debug configuration
   *
   * - `true`: enable all debug components
   * - `false`: disable all debug components
   * - list: enable listed components (merged with `HOLMUX_DEBUG`)
   */
  debug?: DebugConfig;
};

export type ResolvedListenerOptions = {
  host: string;
  port: number;
  frameEncoding: FrameEncoding;
  maxFramePayload: number;
  maxHeadBytes: number;
  idleTimeoutMs: number;
  /** enabled debug components */
  debug: DebugFlag[];
};

export function resolveListenerOptions(
  options: ListenerOptions,
  defaultPort: number,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedListenerOptions {
  const maxFramePayload = options.maxFramePayload ?? MAX_FRAME_PAYLOAD;
  if (
    !Number.isInteger(maxFramePayload) ||
    maxFramePayload <= 0 ||
    maxFramePayload > MAX_FRAME_PAYLOAD
  ) {
    throw new RangeError(`maxFramePayload must be 1..${MAX_FRAME_PAYLOAD} (got ${maxFramePayload})`);
  }

  const port = options.port ?? defaultPort;
  if (!Number.isInteger(port) || port < 0 || port > 0xffff) {
    throw new RangeError(`port must be 0..65535 (got ${port})`);
  }

  return {
    host: options.host ?? DEFAULT_HOST,
    port,
    frameEncoding: options.frameEncoding ?? "length-prefixed",
    maxFramePayload,
    maxHeadBytes: options.maxHeadBytes ?? MAX_HTTP_HEADER_BYTES,
    idleTimeoutMs: options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS,
    debug: debugFlagsToArray(resolveDebugFlags(options.debug, parseDebugEnv(env))),
  };
}

/**
 * TCP listener that hands every accepted socket to a
 * {@link ConnectionHandler} and answers requests through `handleRequest`.
 *
 * Events: `debug` (component, message), `log` (line), `connection`
 * (handler), `request_error` (error, request?).
 */
export abstract class MultiplexServer extends EventEmitter {
  private readonly server: net.Server;
  private readonly connections = new Set<ConnectionHandler>();
  private readonly debugFlags: ReadonlySet<DebugFlag>;
  private nextConnectionId = 1;
  private listening = false;

  constructor(protected readonly listenerOptions: ResolvedListenerOptions) {
    super();
    this.debugFlags = new Set(listenerOptions.debug);
    // Half-open sockets let in-flight workers finish after the client
    // stops sending.
    this.server = net.createServer({ allowHalfOpen: true }, (socket) => {
      this.accept(socket);
    });
    this.server.on("error", (err) => {
      this.emitDebug("conn", `listener error: ${err.message}`);
    });
  }

  protected abstract handleRequest(request: HttpRequest): Promise<ResponseBody>;

  protected hasDebug(flag: DebugFlag) {
    return this.debugFlags.has(flag);
  }

  protected emitDebug(component: DebugComponent, message: string) {
    if (!this.hasDebug(component)) return;
    const normalized = stripTrailingNewline(message);
    this.emit("debug", component, normalized);
    // Legacy string log event
    this.emit("log", `[${component}] ${normalized}`);
  }

  protected reportError(error: Error, request?: HttpRequest) {
    this.emitDebug("http", `request failed: ${error.message}`);
    this.emit("request_error", error, request);
  }

  get connectionCount() {
    return this.connections.size;
  }

  address(): { host: string; port: number } | null {
    const address = this.server.address();
    if (!address || typeof address === "string") return null;
    return { host: address.address, port: address.port };
  }

  listen(): Promise<{ host: string; port: number }> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        reject(err);
      };
      this.server.once("error", onError);
      this.server.listen(this.listenerOptions.port, this.listenerOptions.host, () => {
        this.server.off("error", onError);
        this.listening = true;
        const address = this.address();
        if (!address) {
          reject(new Error("listener has no TCP address"));
          return;
        }
        this.emitDebug("conn", `listening on ${address.host}:${address.port}`);
        resolve(address);
      });
    });
  }

  /**
   * Stop accepting, drop open connections and wait for them to close.
   */
  async close(): Promise<void> {
    const closing = this.listening
      ? new Promise<void>((resolve, reject) => {
          this.server.close((err) => (err ? reject(err) : resolve()));
        })
      : Promise.resolve();
    this.listening = false;

    const pending = [...this.connections].map((connection) => {
      connection.destroy();
      return connection.closed;
    });
    await Promise.all([closing, ...pending]);
  }

  private accept(socket: net.Socket) {
    const id = this.nextConnectionId++;
    const connectionOptions: ConnectionOptions = {
      id,
      frameEncoding: this.listenerOptions.frameEncoding,
      maxFramePayload: this.listenerOptions.maxFramePayload,
      maxHeadBytes: this.listenerOptions.maxHeadBytes,
      idleTimeoutMs: this.listenerOptions.idleTimeoutMs,
    };
    const connection = new ConnectionHandler(
      socket,
      (request) => this.handleRequest(request),
      connectionOptions,
    );

    this.connections.add(connection);
    connection.on("debug", (component: DebugComponent, message: string) => {
      this.emitDebug(component, message);
    });
    connection.on("request_error", (error: Error, request?: HttpRequest) => {
      this.reportError(error, request);
    });
    connection.once("close", () => {
      this.connections.delete(connection);
    });

    this.emitDebug(
      "conn",
      `#${id} accepted from ${socket.remoteAddress ?? "?"}:${socket.remotePort ?? "?"}`,
    );
    this.emit("connection", connection);
  }
}
