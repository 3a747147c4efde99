import type { ResponseBody } from "./connection";
import {
  MultiplexServer,
  resolveListenerOptions,
  type ListenerOptions,
  type ResolvedListenerOptions,
} from "./multiplex-server";
import {
  DEFAULT_RELAY_READ_SIZE,
  DEFAULT_UPSTREAM_TIMEOUT_MS,
  ForwardingRelay,
  createOriginResolver,
  parseHostHeader,
  type OriginAddress,
  type OriginResolver,
} from "./relay";
import type { HttpRequest } from "./request-parser";

export const DEFAULT_PROXY_PORT = 8081;
export const DEFAULT_ORIGIN: OriginAddress = { host: "127.0.0.1", port: 8080 };

export type ProxyServerOptions = ListenerOptions & {
  /** origin for requests without a usable `Host` (`host:port` or address) */
  defaultOrigin?: string | OriginAddress;
  /** replaces `Host`-based origin selection */
  resolveOrigin?: OriginResolver;
  /** upstream read chunk size in `bytes` */
  relayReadSize?: number;
  /** upstream connect/inactivity deadline in `ms` */
  upstreamTimeoutMs?: number;
};

export type ResolvedProxyServerOptions = ResolvedListenerOptions & {
  defaultOrigin: OriginAddress;
  resolveOrigin: OriginResolver | undefined;
  relayReadSize: number;
  upstreamTimeoutMs: number;
};

export function resolveProxyServerOptions(
  options: ProxyServerOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedProxyServerOptions {
  let defaultOrigin = DEFAULT_ORIGIN;
  if (typeof options.defaultOrigin === "string") {
    const parsed = parseHostHeader(options.defaultOrigin);
    if (!parsed) {
      throw new Error(`invalid default origin: ${options.defaultOrigin}`);
    }
    defaultOrigin = parsed;
  } else if (options.defaultOrigin) {
    defaultOrigin = options.defaultOrigin;
  }

  return {
    ...resolveListenerOptions(options, DEFAULT_PROXY_PORT, env),
    defaultOrigin,
    resolveOrigin: options.resolveOrigin,
    relayReadSize: options.relayReadSize ?? DEFAULT_RELAY_READ_SIZE,
    upstreamTimeoutMs: options.upstreamTimeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS,
  };
}

/**
 * Forwarding proxy: each client request is relayed over a fresh upstream
 * connection; status semantics stay with the origin.
 */
export class ProxyServer extends MultiplexServer {
  private readonly relay: ForwardingRelay;

  constructor(readonly options: ResolvedProxyServerOptions) {
    super(options);
    this.relay = new ForwardingRelay({
      resolveOrigin:
        options.resolveOrigin ??
        createOriginResolver({
          defaultOrigin: options.defaultOrigin,
          self: () => this.address(),
        }),
      readSize: options.relayReadSize,
      upstreamTimeoutMs: options.upstreamTimeoutMs,
      onDebug: (message) => this.emitDebug("relay", message),
      onError: (error, request) => this.reportError(error, request),
    });
  }

  static create(options: ProxyServerOptions = {}): ProxyServer {
    return new ProxyServer(resolveProxyServerOptions(options));
  }

  protected handleRequest(request: HttpRequest): Promise<ResponseBody> {
    return this.relay.handle(request);
  }
}
