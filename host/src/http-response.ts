import { formatHttpDate } from "./http-date";

export const SERVER_NAME = "holmux/1.0";

export type HttpStatus = 200 | 304 | 403 | 404 | 500 | 502 | 505;

type StatusInfo = {
  statusText: string;
  /** static HTML body, null when the status carries the resource or nothing */
  body: string | null;
};

export const HTTP_STATUS: Readonly<Record<HttpStatus, StatusInfo>> = {
  200: { statusText: "OK", body: null },
  304: { statusText: "Not Modified", body: null },
  403: { statusText: "Forbidden", body: "<h1>403 Forbidden</h1>" },
  404: { statusText: "Not Found", body: "<h1>404 Not Found</h1>" },
  500: {
    statusText: "Internal Server Error",
    body: "<h1>500 Internal Server Error</h1>",
  },
  502: { statusText: "Bad Gateway", body: "<h1>502 Bad Gateway</h1>" },
  505: {
    statusText: "HTTP Version Not Supported",
    body: "<h1>505 HTTP Version Not Supported</h1>",
  },
};

export type HttpResponseHeaders = Record<string, string>;

export type HttpResponse = {
  status: number;
  statusText: string;
  headers: HttpResponseHeaders;
  body: Buffer;
};

export type CreateResponseOptions = {
  body?: Buffer;
  contentType?: string;
  lastModified?: number;
  /** defaults to the current time */
  now?: Date;
};

export function createResponse(
  status: HttpStatus,
  options: CreateResponseOptions = {},
): HttpResponse {
  const info = HTTP_STATUS[status];
  const body =
    options.body ?? (info.body !== null ? Buffer.from(info.body) : Buffer.alloc(0));

  const headers: HttpResponseHeaders = {
    Date: formatHttpDate(options.now ?? new Date()),
    Server: SERVER_NAME,
  };
  if (options.lastModified !== undefined) {
    headers["Last-Modified"] = formatHttpDate(new Date(options.lastModified));
  }
  // 200 always announces its length so keep-alive peers can find the end of
  // an empty resource.
  if (body.length > 0 || status === 200) {
    headers["Content-Length"] = body.length.toString();
    headers["Content-Type"] = options.contentType ?? "text/html";
  }

  return { status, statusText: info.statusText, headers, body };
}

/**
 * Response for a failure outside the status table (e.g. 431). The
 * connection is closed after it.
 */
export function createErrorResponse(
  status: number,
  statusText: string,
  now: Date = new Date(),
): HttpResponse {
  const body = Buffer.from(`<h1>${status} ${statusText}</h1>`);
  return {
    status,
    statusText,
    headers: {
      Date: formatHttpDate(now),
      Server: SERVER_NAME,
      "Content-Length": body.length.toString(),
      "Content-Type": "text/html",
      Connection: "close",
    },
    body,
  };
}

export function serializeResponseHead(
  response: Pick<HttpResponse, "status" | "statusText" | "headers">,
  httpVersion = "HTTP/1.1",
): Buffer {
  let headerBlock = `${httpVersion} ${response.status} ${response.statusText}\r\n`;

  for (const [rawName, rawValue] of Object.entries(response.headers)) {
    const name = rawName.replace(/[\r\n:]+/g, "");
    if (!name) continue;
    const value = rawValue.replace(/[\r\n]+/g, " ");
    headerBlock += `${name}: ${value}\r\n`;
  }

  headerBlock += "\r\n";
  return Buffer.from(headerBlock, "latin1");
}

export function serializeResponse(response: HttpResponse): Buffer {
  const head = serializeResponseHead(response);
  if (response.body.length === 0) return head;
  return Buffer.concat([head, response.body]);
}
