import path from "path";

import type { ResponseBody } from "./connection";
import { serializeResponse } from "./http-response";
import {
  MultiplexServer,
  resolveListenerOptions,
  type ListenerOptions,
  type ResolvedListenerOptions,
} from "./multiplex-server";
import type { HttpRequest } from "./request-parser";
import { FsResourceStore, type ResourceStore } from "./resource-store";
import { StatusEngine } from "./status-engine";

export const DEFAULT_SERVER_PORT = 8080;
export const DEFAULT_FILE = "test.html";
export const DEFAULT_RESTRICTED = ["private.html"] as const;

export type FileServerOptions = ListenerOptions & {
  /** directory files are served from */
  root?: string;
  /** file served for `/` */
  defaultFile?: string;
  /** request paths answered with 403 */
  restricted?: readonly string[];
  /** replaces the directory-backed store (root/defaultFile/restricted are then unused) */
  store?: ResourceStore;
  /** clock for `Date` headers */
  now?: () => Date;
};

export type ResolvedFileServerOptions = ResolvedListenerOptions & {
  root: string;
  defaultFile: string;
  restricted: readonly string[];
  store: ResourceStore | undefined;
  now: (() => Date) | undefined;
};

export function resolveFileServerOptions(
  options: FileServerOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedFileServerOptions {
  return {
    ...resolveListenerOptions(options, DEFAULT_SERVER_PORT, env),
    root: path.resolve(options.root ?? "."),
    defaultFile: options.defaultFile ?? DEFAULT_FILE,
    restricted: Object.freeze([...(options.restricted ?? DEFAULT_RESTRICTED)]),
    store: options.store,
    now: options.now,
  };
}

/**
 * Static file server: every request is answered by the status engine.
 */
export class FileServer extends MultiplexServer {
  readonly engine: StatusEngine;

  constructor(readonly options: ResolvedFileServerOptions) {
    super(options);
    const store =
      options.store ??
      new FsResourceStore({
        root: options.root,
        defaultFile: options.defaultFile,
        restricted: options.restricted,
      });
    this.engine = new StatusEngine(store, {
      now: options.now,
      onError: (error, request) => this.reportError(error, request),
    });
  }

  static create(options: FileServerOptions = {}): FileServer {
    return new FileServer(resolveFileServerOptions(options));
  }

  protected async handleRequest(request: HttpRequest): Promise<ResponseBody> {
    const response = await this.engine.respond(request);
    this.emitDebug("http", `${request.path} -> ${response.status} ${response.statusText}`);
    return serializeResponse(response);
  }
}
