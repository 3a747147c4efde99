import assert from "node:assert/strict";
import test from "node:test";

import {
  MalformedRequestError,
  parseRequest,
  serializeRequestHead,
} from "../src/request-parser";

test("request-parser: parses request line and headers", () => {
  const request = parseRequest(
    "GET /test.html HTTP/1.1\r\nHost: example.test\r\nX-Trace: a\r\nx-trace: b",
  );
  assert.equal(request.method, "GET");
  assert.equal(request.path, "/test.html");
  assert.equal(request.version, "HTTP/1.1");
  assert.deepEqual(request.headers, { host: "example.test", "x-trace": "b" });
  assert.deepEqual(request.headerLines, [
    ["Host", "example.test"],
    ["X-Trace", "a"],
    ["x-trace", "b"],
  ]);
  assert.equal(request.streamId, undefined);
  assert.equal("streamId" in request, false);
});

test("request-parser: stream id before the request line", () => {
  const request = parseRequest(Buffer.from("STREAM-ID: 7\r\nGET / HTTP/1.1\r\nHost: a"));
  assert.equal(request.streamId, 7);
  assert.equal(request.path, "/");
  assert.deepEqual(request.headers, { host: "a" });
});

test("request-parser: stream id among the headers is not a header", () => {
  const request = parseRequest("GET /a HTTP/1.1\r\nstream-id:42\r\nAccept: */*");
  assert.equal(request.streamId, 42);
  assert.deepEqual(request.headers, { accept: "*/*" });
  assert.deepEqual(request.headerLines, [["Accept", "*/*"]]);
});

test("request-parser: unusable stream ids are ignored", () => {
  assert.equal(parseRequest("GET / HTTP/1.1\r\nSTREAM-ID: abc").streamId, undefined);
  assert.equal(parseRequest("GET / HTTP/1.1\r\nSTREAM-ID: 4294967296").streamId, undefined);
  assert.equal(parseRequest("GET / HTTP/1.1\r\nSTREAM-ID: 4294967295").streamId, 4294967295);
});

test("request-parser: leading blank lines are skipped", () => {
  const request = parseRequest("\r\n\r\nHEAD /x HTTP/1.0");
  assert.equal(request.method, "HEAD");
  assert.equal(request.version, "HTTP/1.0");
});

test("request-parser: request line needs exactly three tokens", () => {
  assert.throws(() => parseRequest("GET /test.html"), MalformedRequestError);
  assert.throws(() => parseRequest("GET /a b HTTP/1.1"), MalformedRequestError);
  assert.throws(() => parseRequest(""), MalformedRequestError);
  assert.throws(() => parseRequest("STREAM-ID: 1"), MalformedRequestError);
});

test("request-parser: header lines need a name and a colon", () => {
  assert.throws(() => parseRequest("GET / HTTP/1.1\r\nnocolon"), MalformedRequestError);
  assert.throws(() => parseRequest("GET / HTTP/1.1\r\n: value"), MalformedRequestError);
});

test("request-parser: serializeRequestHead drops the stream id", () => {
  const request = parseRequest("STREAM-ID: 3\r\nGET /a HTTP/1.1\r\nHost: origin.test:8080\r\nAccept: text/html");
  assert.equal(
    serializeRequestHead(request).toString("latin1"),
    "GET /a HTTP/1.1\r\nHost: origin.test:8080\r\nAccept: text/html\r\n\r\n",
  );
});
