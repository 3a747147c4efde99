import assert from "node:assert/strict";
import net from "node:net";
import test from "node:test";
import { setTimeout as delay } from "node:timers/promises";

import type { ResponseBody } from "../src/connection";
import {
  ForwardingRelay,
  ResponseBoundary,
  createOriginResolver,
  parseHostHeader,
  type OriginAddress,
} from "../src/relay";
import { parseRequest } from "../src/request-parser";

async function collectBody(body: ResponseBody): Promise<Buffer[]> {
  if (Buffer.isBuffer(body)) return [body];
  const chunks: Buffer[] = [];
  for await (const chunk of body) chunks.push(chunk);
  return chunks;
}

type Origin = {
  address: OriginAddress;
  received: string[];
  close: () => Promise<void>;
};

type OriginReply =
  | { kind: "respond"; data: string }
  | { kind: "close" }
  | { kind: "reset"; afterMs: number };

/** Loopback origin that handles every request as `reply` says, keeping the socket open after a response. */
async function startOrigin(reply: (head: string) => OriginReply): Promise<Origin> {
  const received: string[] = [];
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    socket.on("error", () => sockets.delete(socket));
    socket.once("data", (data: Buffer) => {
      const head = data.toString("latin1");
      received.push(head);
      const action = reply(head);
      if (action.kind === "respond") {
        socket.write(action.data);
      } else if (action.kind === "close") {
        socket.end();
      } else {
        setTimeout(() => socket.resetAndDestroy(), action.afterMs);
      }
    });
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  assert.ok(address && typeof address !== "string");

  return {
    address: { host: "127.0.0.1", port: address.port },
    received,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolve());
      }),
  };
}

async function unusedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  assert.ok(address && typeof address !== "string");
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return address.port;
}

test("relay: parseHostHeader", () => {
  assert.deepEqual(parseHostHeader("example.test"), { host: "example.test", port: 80 });
  assert.deepEqual(parseHostHeader(" example.test:8080 "), { host: "example.test", port: 8080 });
  assert.deepEqual(parseHostHeader("[::1]:9000"), { host: "::1", port: 9000 });
  assert.deepEqual(parseHostHeader("[::1]"), { host: "::1", port: 80 });
  assert.equal(parseHostHeader(""), null);
  assert.equal(parseHostHeader("bad host"), null);
  assert.equal(parseHostHeader("x:0"), null);
  assert.equal(parseHostHeader("x:70000"), null);
});

test("relay: origin resolver falls back for missing and self-referencing hosts", () => {
  const defaultOrigin = { host: "127.0.0.1", port: 8080 };
  const resolve = createOriginResolver({
    defaultOrigin,
    self: () => ({ host: "127.0.0.1", port: 8081 }),
  });

  assert.deepEqual(resolve(undefined), defaultOrigin);
  assert.deepEqual(resolve("not a host"), defaultOrigin);
  assert.deepEqual(resolve("localhost:8081"), defaultOrigin);
  assert.deepEqual(resolve("127.0.0.1:8081"), defaultOrigin);
  assert.deepEqual(resolve("origin.test:8081"), { host: "origin.test", port: 8081 });
  assert.deepEqual(resolve("localhost:9000"), { host: "localhost", port: 9000 });
});

test("relay: boundary stops after Content-Length bytes", () => {
  const boundary = new ResponseBoundary("GET");
  const out = boundary.consume(Buffer.from("HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\nhelloEXTRA"));
  assert.equal(out.toString(), "HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\nhello");
  assert.equal(boundary.complete, true);
  assert.equal(boundary.consume(Buffer.from("more")).length, 0);
});

test("relay: boundary follows a head split across chunks", () => {
  const boundary = new ResponseBoundary("GET");
  assert.equal(boundary.consume(Buffer.from("HTTP/1.1 200 OK\r\nContent-Len")).toString(), "HTTP/1.1 200 OK\r\nContent-Len");
  assert.equal(boundary.complete, false);
  assert.equal(boundary.consume(Buffer.from("gth: 3\r\n\r\nab")).toString(), "gth: 3\r\n\r\nab");
  assert.equal(boundary.complete, false);
  assert.equal(boundary.consume(Buffer.from("cdef")).toString(), "c");
  assert.equal(boundary.complete, true);
});

test("relay: boundary for bodiless responses", () => {
  const head = new ResponseBoundary("HEAD");
  assert.equal(
    head.consume(Buffer.from("HTTP/1.1 200 OK\r\nContent-Length: 100\r\n\r\n")).toString(),
    "HTTP/1.1 200 OK\r\nContent-Length: 100\r\n\r\n",
  );
  assert.equal(head.complete, true);

  const notModified = new ResponseBoundary("GET");
  notModified.consume(Buffer.from("HTTP/1.1 304 Not Modified\r\nDate: x\r\n\r\n"));
  assert.equal(notModified.complete, true);
});

test("relay: without Content-Length the response runs until close", () => {
  const boundary = new ResponseBoundary("GET");
  boundary.consume(Buffer.from("HTTP/1.1 200 OK\r\n\r\nabc"));
  assert.equal(boundary.consume(Buffer.from("def")).toString(), "def");
  assert.equal(boundary.complete, false);
});

test("relay: forwards the request and relays the origin response", async () => {
  const reply = "HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\nhello";
  const origin = await startOrigin(() => ({ kind: "respond", data: reply }));
  try {
    const relay = new ForwardingRelay({ resolveOrigin: () => origin.address, readSize: 8 });
    const request = parseRequest(
      `STREAM-ID: 9\r\nGET /page HTTP/1.1\r\nHost: 127.0.0.1:${origin.address.port}\r\nAccept: */*`,
    );

    const chunks = await collectBody(await relay.handle(request));
    assert.ok(chunks.every((chunk) => chunk.length <= 8));
    assert.equal(Buffer.concat(chunks).toString(), reply);
    assert.deepEqual(origin.received, [
      `GET /page HTTP/1.1\r\nHost: 127.0.0.1:${origin.address.port}\r\nAccept: */*\r\n\r\n`,
    ]);
  } finally {
    await origin.close();
  }
});

test("relay: unsupported versions are answered locally", async () => {
  let lookups = 0;
  const relay = new ForwardingRelay({
    resolveOrigin: () => {
      lookups += 1;
      return { host: "127.0.0.1", port: 1 };
    },
  });

  const chunks = await collectBody(await relay.handle(parseRequest("GET / HTTP/1.0")));
  const text = Buffer.concat(chunks).toString();
  assert.ok(text.startsWith("HTTP/1.1 505 HTTP Version Not Supported\r\n"));
  assert.equal(lookups, 0);
});

test("relay: unreachable origin yields 502", async () => {
  const port = await unusedPort();
  const errors: Error[] = [];
  const relay = new ForwardingRelay({
    resolveOrigin: () => ({ host: "127.0.0.1", port }),
    onError: (error) => errors.push(error),
  });

  const chunks = await collectBody(await relay.handle(parseRequest("GET / HTTP/1.1")));
  const text = Buffer.concat(chunks).toString();
  assert.ok(text.startsWith("HTTP/1.1 502 Bad Gateway\r\n"));
  assert.ok(text.endsWith("<h1>502 Bad Gateway</h1>"));
  assert.equal(errors.length, 1);
});

test("relay: origin closing without a response yields 502", async () => {
  const origin = await startOrigin(() => ({ kind: "close" }));
  try {
    const relay = new ForwardingRelay({ resolveOrigin: () => origin.address });
    const chunks = await collectBody(await relay.handle(parseRequest("GET / HTTP/1.1")));
    assert.ok(Buffer.concat(chunks).toString().startsWith("HTTP/1.1 502 Bad Gateway\r\n"));
  } finally {
    await origin.close();
  }
});

test("relay: upstream reset before the body is read yields 502", async () => {
  const origin = await startOrigin(() => ({ kind: "reset", afterMs: 20 }));
  try {
    const errors: Error[] = [];
    const relay = new ForwardingRelay({
      resolveOrigin: () => origin.address,
      onError: (error) => errors.push(error),
    });

    const body = await relay.handle(parseRequest("GET / HTTP/1.1"));
    // the client side has not started reading when the origin resets
    await delay(150);

    const text = Buffer.concat(await collectBody(body)).toString();
    assert.ok(text.startsWith("HTTP/1.1 502 Bad Gateway\r\n"));
    assert.equal(errors.length, 1);
    assert.match(errors[0].message, /ECONNRESET/);
  } finally {
    await origin.close();
  }
});
