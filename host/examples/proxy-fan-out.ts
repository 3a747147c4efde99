/**
 * File server behind the forwarding proxy, driven by one multiplexed client.
 *
 * Run with (from repo root):
 *   cd host
 *   npx tsx examples/proxy-fan-out.ts [DIR]
 *
 * Notes:
 * - Both listeners bind ephemeral loopback ports.
 * - Every path is sent on its own stream; responses print as their end
 *   frame arrives, which need not be request order.
 */

import { FileServer, MuxClient, ProxyServer, type Frame } from "../src";

async function main() {
  const root = process.argv[2] ?? ".";

  const origin = FileServer.create({ root, port: 0 });
  const originAddress = await origin.listen();

  const proxy = ProxyServer.create({
    port: 0,
    defaultOrigin: `${originAddress.host}:${originAddress.port}`,
  });
  const proxyAddress = await proxy.listen();
  console.log(`origin ${originAddress.port}, proxy ${proxyAddress.port}`);

  const client = await MuxClient.connect(proxyAddress.port, proxyAddress.host);
  client.on("frame", (frame: Frame) => {
    console.log(`  frame stream=${frame.streamId} end=${frame.end} bytes=${frame.payload.length}`);
  });

  try {
    const paths = ["/", "/private.html", "/missing.html"];
    await Promise.all(
      paths.map(async (path) => {
        const response = await client.request(path);
        console.log(`${path} -> ${response.status} ${response.statusText}`);
      }),
    );
  } finally {
    client.close();
    await proxy.close();
    await origin.close();
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
