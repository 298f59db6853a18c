/**
 * Integration test: gateway over real sockets, all in process.
 *
 * A fake IRC server and the control server both listen on 127.0.0.1 with
 * ephemeral ports; the CLI client drives the control protocol.
 */

import net from "node:net";
import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, beforeAll, afterAll, expect } from "vitest";
import { GatewayClient, GatewayRpcError } from "../../src/client.js";
import { ConfigStore } from "../../src/config.js";
import { bootDaemon } from "../../src/daemon.js";
import { LineFramer } from "../../src/framer.js";
import { setLogSink } from "../../src/log.js";
import type { PushNotification } from "../../src/protocol.js";
import { ConnectionRegistry } from "../../src/registry.js";
import { ControlServer } from "../../src/server.js";
import { netDialer } from "../../src/transport.js";
import { createFakeDialer, tempConfig } from "../helpers/fakes.js";

const SECRET = "test-secret";

class Queue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T) => void> = [];

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter(item);
    else this.items.push(item);
  }

  next(timeoutMs = 3000): Promise<T> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve(item);
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => reject(new Error("timed out waiting for item")), timeoutMs);
      this.waiters.push((value) => {
        clearTimeout(timer);
        resolve(value);
      });
    });
  }
}

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") reject(new Error("no TCP address"));
      else resolve(address.port);
    });
  });
}

describe("Gateway — in-process integration", () => {
  const ircLines = new Queue<string>();
  const pushes = new Queue<PushNotification>();
  const ircSockets: net.Socket[] = [];
  let ircServer: net.Server;
  let registry: ConnectionRegistry;
  let control: ControlServer;
  let controlPort = 0;
  let client: GatewayClient;

  beforeAll(async () => {
    setLogSink(() => {});

    ircServer = net.createServer((socket) => {
      ircSockets.push(socket);
      const framer = new LineFramer((line) => ircLines.push(line.toString("utf-8")));
      socket.on("data", (chunk: Buffer) => framer.push(chunk));
      socket.on("error", () => socket.destroy());
    });
    const ircPort = await listen(ircServer);

    const dir = mkdtempSync(join(tmpdir(), "irc-gateway-it-"));
    const config = ConfigStore.create(join(dir, "config.json"), {
      control: { secret: SECRET, host: "127.0.0.1", port: 50000 },
      networks: {
        local: {
          host: "127.0.0.1",
          port: ircPort,
          nick: "tester",
          user: "tester",
          realname: "Tester",
          channels: ["#home"],
        },
      },
    });

    registry = new ConnectionRegistry(config, netDialer);
    registry.start();
    control = new ControlServer({ host: "127.0.0.1", port: 0, secret: SECRET, registry });
    controlPort = (await control.start()).port;

    client = await GatewayClient.connect({ secret: SECRET, host: "127.0.0.1", port: controlPort });
    client.onPush = (push) => pushes.push(push);
  });

  afterAll(async () => {
    client.end();
    registry.closeAll();
    await control.stop();
    for (const socket of ircSockets) socket.destroy();
    await new Promise<void>((resolve) => ircServer.close(() => resolve()));
    setLogSink(null);
  });

  it("registers with NICK and USER", async () => {
    expect(await ircLines.next()).toBe("NICK tester");
    expect(await ircLines.next()).toBe("USER tester 127.0.0.1 x :Tester");
  });

  it("streams received lines and joins saved channels on 376", async () => {
    expect(await client.call("stream.start")).toBe("success");
    ircSockets[0].write(":irc.test 376 tester :End of MOTD\r\n");

    const push = await pushes.next();
    expect(push.params).toEqual({ network: "local", message: ":irc.test 376 tester :End of MOTD" });
    expect(await ircLines.next()).toBe("JOIN #home");
  });

  it("answers PING on behalf of the user", async () => {
    ircSockets[0].write("PING :irc.test\r\n");
    expect((await pushes.next()).params.message).toBe("PING :irc.test");
    expect(await ircLines.next()).toBe("PONG :irc.test");
  });

  it("sends raw lines and persists joined channels", async () => {
    expect(await client.call("network.send", { name: "local", message: "JOIN #extra" })).toBe("success");
    expect(await ircLines.next()).toBe("JOIN #extra");
    const networks = await client.call("network.get");
    expect(networks).toEqual({
      local: expect.objectContaining({ channels: ["#home", "#extra"] }),
    });
  });

  it("reports unknown networks as JSON-RPC errors", async () => {
    const err = await client.call("network.delete", { name: "nowhere" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GatewayRpcError);
    expect(err).toMatchObject({ code: -32002, message: "network.delete: unknown network 'nowhere'" });
  });

  it("drops a client that presents the wrong secret", async () => {
    const intruder = await GatewayClient.connect({ secret: "wrong-secret", host: "127.0.0.1", port: controlPort });
    await expect(intruder.call("network.get")).rejects.toThrow("Connection closed by gateway");
  });

  it("closes the connection on control.disconnect", async () => {
    const other = await GatewayClient.connect({ secret: SECRET, host: "127.0.0.1", port: controlPort });
    other.notify("control.disconnect");
    await other.waitClosed();
    await expect(other.call("network.get")).rejects.toThrow("Connection closed by gateway");
  });
});

describe("bootDaemon — first run", () => {
  it("writes a fresh config and does not start", async () => {
    setLogSink(() => {});
    try {
      const path = join(mkdtempSync(join(tmpdir(), "irc-gateway-boot-")), "nested", "config.json");
      const result = await bootDaemon({ configPath: path });
      expect(result).toEqual({ kind: "generated", path });
      const store = ConfigStore.open(path);
      expect(Object.keys(store.networks())).toEqual(["libera"]);
      expect(store.get("control").port).toBeGreaterThanOrEqual(49152);
    } finally {
      setLogSink(null);
    }
  });
});

describe("ControlServer.start", () => {
  it("can be started again after the port was taken", async () => {
    setLogSink(() => {});
    const blocker = net.createServer();
    const port = await listen(blocker);
    const registry = new ConnectionRegistry(tempConfig({}), createFakeDialer().dialer);
    const server = new ControlServer({ host: "127.0.0.1", port, secret: SECRET, registry });
    try {
      await expect(server.start()).rejects.toMatchObject({ code: "EADDRINUSE" });
      await new Promise<void>((resolve) => blocker.close(() => resolve()));
      const address = await server.start();
      expect(address.port).toBe(port);
    } finally {
      await server.stop();
      if (blocker.listening) blocker.close();
      setLogSink(null);
    }
  });
});
