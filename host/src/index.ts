/**
 * holmux
 *
 * HTTP/1.1 file server and forwarding proxy that multiplex concurrent
 * request streams over one client connection with a small framing
 * protocol.
 */

// Servers
export {
  FileServer,
  resolveFileServerOptions,
  DEFAULT_FILE,
  DEFAULT_RESTRICTED,
  DEFAULT_SERVER_PORT,
  type FileServerOptions,
  type ResolvedFileServerOptions,
} from "./file-server";
export {
  ProxyServer,
  resolveProxyServerOptions,
  DEFAULT_ORIGIN,
  DEFAULT_PROXY_PORT,
  type ProxyServerOptions,
  type ResolvedProxyServerOptions,
} from "./proxy-server";
export {
  MultiplexServer,
  resolveListenerOptions,
  type ListenerOptions,
  type ResolvedListenerOptions,
} from "./multiplex-server";

// Connection handling
export {
  ConnectionHandler,
  ConnectionClosedError,
  type ConnectionOptions,
  type ConnectionSocket,
  type ConnectionState,
  type RequestHandler,
  type ResponseBody,
} from "./connection";
export { AsyncMutex, AsyncSemaphore } from "./async-utils";

// Requests and responses
export {
  parseRequest,
  serializeRequestHead,
  MalformedRequestError,
  SUPPORTED_HTTP_VERSION,
  STREAM_ID_HEADER,
  type HttpRequest,
  type HttpHeaderLine,
} from "./request-parser";
export {
  createResponse,
  createErrorResponse,
  serializeResponse,
  serializeResponseHead,
  HTTP_STATUS,
  SERVER_NAME,
  type HttpResponse,
  type HttpResponseHeaders,
  type HttpStatus,
} from "./http-response";
export { formatHttpDate, parseHttpDate } from "./http-date";
export { HttpResponseError } from "./http-utils";

// Status decisions
export { StatusEngine, decideStatus, type StatusDecision } from "./status-engine";
export {
  FsResourceStore,
  contentTypeFor,
  type ResourceFacts,
  type ResourceStore,
  type FsResourceStoreOptions,
} from "./resource-store";

// Framing
export {
  frameResponse,
  frameStream,
  encodeFrame,
  decodeDelimitedFrame,
  FrameDecoder,
  FrameDecodeError,
  StreamAssembler,
  MAX_FRAME_PAYLOAD,
  FRAME_HEADER_BYTES,
  type Frame,
  type FrameEncoding,
} from "./frame-protocol";

// Relay
export {
  ForwardingRelay,
  ResponseBoundary,
  createOriginResolver,
  parseHostHeader,
  type OriginAddress,
  type OriginResolver,
  type ForwardingRelayOptions,
} from "./relay";

// Client
export {
  MuxClient,
  parseHttpResponse,
  type MuxResponse,
  type MuxRequestOptions,
  type ParsedHttpResponse,
} from "./mux-client";

// Debug helpers
export {
  type DebugFlag,
  type DebugConfig,
  type DebugComponent,
  type DebugLogFn,
} from "./debug";
