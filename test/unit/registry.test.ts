import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { ConfigStore } from "../../src/config.js";
import { setLogSink } from "../../src/log.js";
import { ConnectionRegistry, parseTrackedCommand } from "../../src/registry.js";
import { createFakeDialer, networkConfig, tempConfig } from "../helpers/fakes.js";

beforeAll(() => setLogSink(() => {}));
afterAll(() => setLogSink(null));

function setup(channels: string[] = ["#a"]) {
  const config = tempConfig({ alpha: networkConfig({ channels }) });
  const fake = createFakeDialer();
  const registry = new ConnectionRegistry(config, fake.dialer);
  registry.start();
  return { config, registry, ...fake };
}

describe("ConnectionRegistry.start", () => {
  it("creates and dials a client for every persisted network", () => {
    const config = tempConfig({
      alpha: networkConfig(),
      beta: networkConfig({ host: "irc.beta.test", port: 6697 }),
    });
    const { dialer, connections } = createFakeDialer();
    const registry = new ConnectionRegistry(config, dialer);
    registry.start();
    expect(registry.names().sort()).toEqual(["alpha", "beta"]);
    expect(connections.map((c) => `${c.host}:${c.port}`).sort()).toEqual([
      "irc.alpha.test:6667",
      "irc.beta.test:6697",
    ]);
  });
});

describe("ConnectionRegistry.add", () => {
  it("persists the network with no channels and the default port", () => {
    const { config, registry, connectionTo } = setup();
    registry.add({ name: "beta", host: "irc.beta.test", nick: "n", user: "u", realname: "R" });
    expect(ConfigStore.open(config.path).network("beta")).toEqual({
      host: "irc.beta.test",
      port: 6667,
      nick: "n",
      user: "u",
      realname: "R",
      channels: [],
    });
    expect(registry.get("beta")?.state).toBe("connecting");
    expect(connectionTo("irc.beta.test").port).toBe(6667);
  });

  it("attaches the subscriber before dialling", () => {
    const { registry } = setup();
    const handler = vi.fn();
    const client = registry.add(
      { name: "beta", host: "irc.beta.test", port: 7000, nick: "n", user: "u", realname: "R" },
      handler,
    );
    expect(client.isSubscribed(handler)).toBe(true);
  });

  it("replaces an existing network of the same name", () => {
    const { registry, connectionTo } = setup();
    const old = connectionTo("irc.alpha.test");
    registry.add({ name: "alpha", host: "irc.other.test", nick: "n", user: "u", realname: "R" });
    expect(old.closed).toBe(true);
    expect(registry.size).toBe(1);
    expect(registry.networks().alpha.host).toBe("irc.other.test");
  });

  it("keeps the registry and the file in step for a network named __proto__", () => {
    const { config, registry } = setup();
    registry.add({ name: "__proto__", host: "irc.proto.test", nick: "n", user: "u", realname: "R" });
    expect(registry.names().sort()).toEqual(["__proto__", "alpha"]);
    expect(Object.keys(ConfigStore.open(config.path).networks()).sort()).toEqual(["__proto__", "alpha"]);
  });
});

describe("ConnectionRegistry.delete", () => {
  it("returns false and changes nothing for an unknown name", () => {
    const { config, registry } = setup();
    expect(registry.delete("x")).toBe(false);
    expect(registry.names()).toEqual(["alpha"]);
    expect(Object.keys(ConfigStore.open(config.path).networks())).toEqual(["alpha"]);
  });

  it("closes the client, unregisters it and removes the persisted entry", () => {
    const { config, registry, connectionTo } = setup();
    expect(registry.delete("alpha")).toBe(true);
    expect(connectionTo("irc.alpha.test").closed).toBe(true);
    expect(registry.has("alpha")).toBe(false);
    expect(ConfigStore.open(config.path).networks()).toEqual({});
  });
});

describe("ConnectionRegistry.send", () => {
  it("returns false for an unknown network", () => {
    const { registry } = setup();
    expect(registry.send("x", "PRIVMSG #a :hi")).toBe(false);
  });

  it("JOIN adds channels to the persisted set and goes out verbatim", () => {
    const { config, registry, connectionTo } = setup(["#a"]);
    const conn = connectionTo("irc.alpha.test");
    conn.open();
    registry.send("alpha", "JOIN #a,#b");
    expect(ConfigStore.open(config.path).network("alpha")?.channels).toEqual(["#a", "#b"]);
    expect(conn.written.at(-1)).toBe("JOIN #a,#b\r\n");
  });

  it("PART removes channels from the persisted set", () => {
    const { config, registry } = setup(["#a", "#b"]);
    registry.send("alpha", "PART #a");
    expect(ConfigStore.open(config.path).network("alpha")?.channels).toEqual(["#b"]);
  });

  it("NICK updates the persisted nick", () => {
    const { config, registry } = setup();
    registry.send("alpha", "nick newnick");
    expect(ConfigStore.open(config.path).network("alpha")?.nick).toBe("newnick");
  });

  it("matches the command case-insensitively", () => {
    const { registry } = setup([]);
    registry.send("alpha", "jOiN #lower");
    expect(registry.networks().alpha.channels).toEqual(["#lower"]);
  });

  it("leaves the config alone for other commands", () => {
    const { config, registry } = setup(["#a"]);
    registry.send("alpha", "PRIVMSG #a :join #b");
    expect(ConfigStore.open(config.path).network("alpha")?.channels).toEqual(["#a"]);
  });

  it("hands the updated channel set to the client for the next 376", () => {
    const { registry, connectionTo } = setup(["#a"]);
    const conn = connectionTo("irc.alpha.test");
    conn.open();
    registry.send("alpha", "JOIN #b");
    const before = conn.lines.length;
    conn.receive(":srv 376 gw :End\r\n");
    expect(conn.lines.slice(before).sort()).toEqual(["JOIN #a", "JOIN #b"]);
  });
});

describe("ConnectionRegistry subscriptions", () => {
  it("subscribeAll and unsubscribeAll cover every client", () => {
    const { registry } = setup();
    registry.add({ name: "beta", host: "irc.beta.test", nick: "n", user: "u", realname: "R" });
    const handler = vi.fn();
    registry.subscribeAll(handler);
    expect(registry.all().every((c) => c.isSubscribed(handler))).toBe(true);
    registry.unsubscribeAll(handler);
    expect(registry.all().some((c) => c.isSubscribed(handler))).toBe(false);
  });

  it("closeAll disconnects every client but keeps them registered", () => {
    const { registry } = setup();
    registry.closeAll();
    expect(registry.get("alpha")?.state).toBe("disconnected");
    expect(registry.has("alpha")).toBe(true);
  });
});

describe("parseTrackedCommand", () => {
  it("splits JOIN and PART targets on commas", () => {
    expect(parseTrackedCommand("JOIN #a,#b key")).toEqual({ verb: "join", args: ["#a", "#b"] });
    expect(parseTrackedCommand("part #a")).toEqual({ verb: "part", args: ["#a"] });
  });

  it("reads the new nick", () => {
    expect(parseTrackedCommand("NICK other")).toEqual({ verb: "nick", args: ["other"] });
  });

  it("ignores commands without a trailing space or argument", () => {
    expect(parseTrackedCommand("JOIN")).toBeNull();
    expect(parseTrackedCommand("JOIN ")).toBeNull();
    expect(parseTrackedCommand("JOINED #a")).toBeNull();
    expect(parseTrackedCommand("PRIVMSG #a :hi")).toBeNull();
  });
});
