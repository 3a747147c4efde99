import assert from "node:assert/strict";
import fs from "node:fs";
import net from "node:net";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { Client } from "undici";

import { FileServer } from "../src/file-server";
import { decodeDelimitedFrame } from "../src/frame-protocol";
import { MuxClient } from "../src/mux-client";

const MTIME_MS = Date.UTC(2024, 0, 2, 3, 4, 5);

function makeRoot(): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "holmux-server-"));
  fs.writeFileSync(path.join(root, "test.html"), "<h1>test</h1>");
  fs.writeFileSync(path.join(root, "private.html"), "secret");
  fs.writeFileSync(path.join(root, "big.bin"), Buffer.alloc(5000, 0x5a));
  fs.utimesSync(path.join(root, "test.html"), MTIME_MS / 1000, MTIME_MS / 1000);
  return root;
}

test("file-server: plain HTTP/1.1 clients see ordinary responses", async () => {
  const root = makeRoot();
  const server = FileServer.create({ root, port: 0, debug: false });
  const { port } = await server.listen();
  const client = new Client(`http://127.0.0.1:${port}`);

  try {
    const ok = await client.request({ path: "/test.html", method: "GET" });
    assert.equal(ok.statusCode, 200);
    assert.equal(ok.headers["content-type"], "text/html; charset=utf-8");
    assert.equal(ok.headers["last-modified"], "Tue, 02 Jan 2024 03:04:05 GMT");
    assert.equal(ok.headers["server"], "holmux/1.0");
    assert.equal(await ok.body.text(), "<h1>test</h1>");

    const forbidden = await client.request({ path: "/private.html", method: "GET" });
    assert.equal(forbidden.statusCode, 403);
    assert.equal(await forbidden.body.text(), "<h1>403 Forbidden</h1>");

    const missing = await client.request({ path: "/missing.html", method: "GET" });
    assert.equal(missing.statusCode, 404);
    assert.equal(await missing.body.text(), "<h1>404 Not Found</h1>");

    const notModified = await client.request({
      path: "/test.html",
      method: "GET",
      headers: { "if-modified-since": "Wed, 03 Jan 2024 00:00:00 GMT" },
    });
    assert.equal(notModified.statusCode, 304);
    assert.equal(await notModified.body.text(), "");

    const stale = await client.request({
      path: "/",
      method: "GET",
      headers: { "if-modified-since": "Mon, 01 Jan 2024 00:00:00 GMT" },
    });
    assert.equal(stale.statusCode, 200);
    assert.equal(await stale.body.text(), "<h1>test</h1>");
  } finally {
    await client.close();
    await server.close();
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("file-server: multiplexed requests share one connection", async () => {
  const root = makeRoot();
  const server = FileServer.create({ root, port: 0, debug: false });
  const { port } = await server.listen();
  const client = await MuxClient.connect(port);

  try {
    const [big, page, missing, oldVersion] = await Promise.all([
      client.request("/big.bin"),
      client.request("/test.html"),
      client.request("/missing.html"),
      client.request("/test.html", { version: "HTTP/1.0" }),
    ]);

    assert.deepEqual(
      [big.streamId, page.streamId, missing.streamId, oldVersion.streamId],
      [1, 2, 3, 4],
    );

    assert.equal(big.status, 200);
    assert.equal(big.headers["content-type"], "application/octet-stream");
    assert.deepEqual(big.body, Buffer.alloc(5000, 0x5a));
    assert.equal(big.frames, Math.ceil(big.raw.length / 1024));

    assert.equal(page.status, 200);
    assert.equal(page.body.toString(), "<h1>test</h1>");
    assert.equal(page.frames, 1);

    assert.equal(missing.status, 404);
    assert.equal(oldVersion.status, 505);
    assert.equal(oldVersion.statusText, "HTTP Version Not Supported");
    assert.equal(client.openStreams, 0);
    assert.equal(client.trackedStreams, 0);
    assert.equal(server.connectionCount, 1);
  } finally {
    client.close();
    await server.close();
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("file-server: delimited framing on the wire", async () => {
  const root = makeRoot();
  const server = FileServer.create({ root, port: 0, frameEncoding: "delimited", debug: false });
  const { port } = await server.listen();
  const socket = net.createConnection({ host: "127.0.0.1", port });

  try {
    const received = await new Promise<Buffer>((resolve, reject) => {
      const chunks: Buffer[] = [];
      socket.on("error", reject);
      socket.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
        const all = Buffer.concat(chunks);
        if (all.toString("latin1").endsWith("<h1>404 Not Found</h1>")) resolve(all);
      });
      socket.write("STREAM-ID: 17\r\nGET /missing.html HTTP/1.1\r\n\r\n");
    });

    const frame = decodeDelimitedFrame(received);
    assert.equal(frame.streamId, 17);
    assert.equal(frame.end, true);
    assert.ok(frame.payload.toString("latin1").startsWith("HTTP/1.1 404 Not Found\r\n"));
  } finally {
    socket.destroy();
    await server.close();
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("file-server: debug events report served requests", async () => {
  const root = makeRoot();
  const server = FileServer.create({ root, port: 0, debug: ["http"] });
  const messages: string[] = [];
  server.on("debug", (component: string, message: string) => {
    messages.push(`${component}: ${message}`);
  });
  const { port } = await server.listen();
  const client = await MuxClient.connect(port);

  try {
    const response = await client.request("/test.html");
    assert.equal(response.status, 200);
    assert.ok(messages.includes("http: /test.html -> 200 OK"));
    assert.ok(messages.includes("http: #1 GET /test.html HTTP/1.1 stream=1"));
    assert.ok(messages.every((message) => message.startsWith("http: ")));
  } finally {
    client.close();
    await server.close();
    fs.rmSync(root, { recursive: true, force: true });
  }
});
