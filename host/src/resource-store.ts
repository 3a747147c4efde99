import fs from "fs";
import path from "path";

import mime from "mime-types";

export const DEFAULT_CONTENT_TYPE = "text/html";

/**
 * What the status engine needs to know about a request path.
 */
export type ResourceFacts = {
  /** path is on the restricted list (checked before existence) */
  restricted: boolean;
  /** a regular file resolves under the serving root */
  exists: boolean;
  /** modification time in epoch `ms` (0 when missing) */
  lastModified: number;
  contentType: string;
};

export interface ResourceStore {
  resolve(requestPath: string): Promise<ResourceFacts>;
  read(requestPath: string): Promise<Buffer>;
}

export type FsResourceStoreOptions = {
  /** serving root directory */
  root: string;
  /** file served for `/` */
  defaultFile: string;
  /** request paths (with or without leading slash) that always yield 403 */
  restricted: readonly string[];
};

export function normalizeRequestPath(requestPath: string, defaultFile: string): string {
  let pathname = requestPath;
  const query = pathname.search(/[?#]/);
  if (query !== -1) pathname = pathname.slice(0, query);

  try {
    pathname = decodeURIComponent(pathname);
  } catch {
    // keep the raw path, it will simply not resolve
  }

  const relative = pathname.replace(/^\/+/, "");
  return relative === "" ? defaultFile : relative;
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

export function contentTypeFor(filePath: string): string {
  return mime.contentType(path.extname(filePath)) || DEFAULT_CONTENT_TYPE;
}

/**
 * Resource store backed by a directory on disk.
 *
 * Paths that escape the root after normalization never resolve.
 */
export class FsResourceStore implements ResourceStore {
  private readonly root: string;
  private readonly defaultFile: string;
  private readonly restricted: ReadonlySet<string>;

  constructor(options: FsResourceStoreOptions) {
    this.root = path.resolve(options.root);
    this.defaultFile = options.defaultFile;
    this.restricted = new Set(options.restricted.map((entry) => this.resolvedKey(entry)));
  }

  /**
   * Restricted entries and request paths are compared after dot segments
   * are resolved, so `/x/../private.html` names the same file as
   * `/private.html`.
   */
  isRestricted(requestPath: string): boolean {
    return this.restricted.has(this.resolvedKey(requestPath));
  }

  private resolvedKey(requestPath: string): string {
    const relative = normalizeRequestPath(requestPath, this.defaultFile);
    return path.relative(this.root, path.resolve(this.root, relative));
  }

  private toFilePath(requestPath: string): string | null {
    const relative = normalizeRequestPath(requestPath, this.defaultFile);
    const filePath = path.resolve(this.root, relative);
    if (filePath !== this.root && !filePath.startsWith(this.root + path.sep)) {
      return null;
    }
    return filePath;
  }

  async resolve(requestPath: string): Promise<ResourceFacts> {
    const filePath = this.toFilePath(requestPath);
    const facts: ResourceFacts = {
      restricted: this.isRestricted(requestPath),
      exists: false,
      lastModified: 0,
      contentType: contentTypeFor(filePath ?? requestPath),
    };
    if (facts.restricted || filePath === null) return facts;

    try {
      const stats = await fs.promises.stat(filePath);
      if (stats.isFile()) {
        facts.exists = true;
        facts.lastModified = stats.mtimeMs;
      }
    } catch (err) {
      const code = errnoCode(err);
      if (code !== "ENOENT" && code !== "ENOTDIR") throw err;
    }

    return facts;
  }

  async read(requestPath: string): Promise<Buffer> {
    const filePath = this.toFilePath(requestPath);
    if (filePath === null) {
      throw new Error(`path escapes serving root: ${requestPath}`);
    }
    return fs.promises.readFile(filePath);
  }
}
