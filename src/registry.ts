// registry.ts — live NetworkClients keyed by network name
// Registry keys and the persisted `networks` mapping stay in bijection:
// add persists before registering; delete unregisters before persisting.

import type { EventHandler } from "./bus.js";
import { DEFAULT_IRC_PORT, type ConfigStore, type NetworkConfig, type NetworkMap } from "./config.js";
import { NetworkClient } from "./irc-client.js";
import { errorMessage, log } from "./log.js";
import type { Dialer } from "./transport.js";

export interface AddNetworkParams {
  name: string;
  host: string;
  port?: number;
  nick: string;
  user: string;
  realname: string;
}

export class ConnectionRegistry {
  private readonly clients = new Map<string, NetworkClient>();

  constructor(
    private readonly config: ConfigStore,
    private readonly dialer: Dialer,
  ) {}

  /** Creates and connects a client for every persisted network. */
  start(): void {
    for (const [name, net] of Object.entries(this.config.networks())) {
      const client = this.createClient(name, net);
      this.clients.set(name, client);
      client.connect();
    }
  }

  get(name: string): NetworkClient | undefined {
    return this.clients.get(name);
  }

  has(name: string): boolean {
    return this.clients.has(name);
  }

  names(): string[] {
    return [...this.clients.keys()];
  }

  all(): NetworkClient[] {
    return [...this.clients.values()];
  }

  get size(): number {
    return this.clients.size;
  }

  /** Persisted network mapping. */
  networks(): NetworkMap {
    return this.config.networks();
  }

  /**
   * Persists a new network with no channels, then registers and connects its
   * client. `subscriber`, when given, is attached before the socket is dialled.
   * An existing network of the same name is closed and replaced.
   */
  add(params: AddNetworkParams, subscriber?: EventHandler): NetworkClient {
    const net: NetworkConfig = {
      host: params.host,
      port: params.port ?? DEFAULT_IRC_PORT,
      nick: params.nick,
      user: params.user,
      realname: params.realname,
      channels: [],
    };
    this.config.putNetwork(params.name, net);

    const previous = this.clients.get(params.name);
    if (previous) {
      log.warn("control", `** Replacing network ${params.name}`);
      previous.disconnect();
    }

    const client = this.createClient(params.name, net);
    if (subscriber) client.subscribe(subscriber);
    this.clients.set(params.name, client);
    client.connect();
    return client;
  }

  /** Returns false when the name is not registered. */
  delete(name: string): boolean {
    const client = this.clients.get(name);
    if (!client) return false;
    client.disconnect();
    this.clients.delete(name);
    this.config.deleteNetwork(name);
    return true;
  }

  /**
   * Sends a raw line. JOIN/PART/NICK update the persisted channel set or nick
   * before the line goes out. Returns false when the name is not registered.
   */
  send(name: string, message: string): boolean {
    const client = this.clients.get(name);
    if (!client) return false;
    const updated = this.persistSideEffects(name, message);
    if (updated) client.updateConfig(updated);
    client.send(message);
    return true;
  }

  subscribeAll(handler: EventHandler): void {
    for (const client of this.clients.values()) client.subscribe(handler);
  }

  unsubscribeAll(handler: EventHandler): void {
    for (const client of this.clients.values()) client.unsubscribe(handler);
  }

  closeAll(): void {
    for (const client of this.clients.values()) client.disconnect();
  }

  private createClient(name: string, net: NetworkConfig): NetworkClient {
    return new NetworkClient(name, net, this.dialer, (err) => {
      log.error(name, `** Error handling incoming line: ${errorMessage(err)}`);
    });
  }

  private persistSideEffects(name: string, message: string): NetworkConfig | null {
    const command = parseTrackedCommand(message);
    if (!command || !this.config.hasNetwork(name)) return null;

    return this.config.updateNetwork(name, (net) => {
      switch (command.verb) {
        case "join":
          return { ...net, channels: union(net.channels, command.args) };
        case "part":
          return { ...net, channels: difference(net.channels, command.args) };
        case "nick":
          return { ...net, nick: command.args[0] };
      }
    });
  }
}

// --- Outbound command tracking ---

export interface TrackedCommand {
  verb: "join" | "part" | "nick";
  args: string[];
}

/**
 * Recognises lines starting (case-insensitively) with "join ", "part " or
 * "nick ". For JOIN/PART the second token is split on commas; for NICK it is
 * the new nick. Returns null for anything else, including a missing argument.
 */
export function parseTrackedCommand(message: string): TrackedCommand | null {
  const prefix = message.slice(0, 5).toLowerCase();
  const verb = prefix === "join " ? "join" : prefix === "part " ? "part" : prefix === "nick " ? "nick" : null;
  if (!verb) return null;

  const target = message.split(/\s+/).filter((t) => t.length > 0)[1];
  if (!target) return null;
  if (verb === "nick") return { verb, args: [target] };
  return { verb, args: target.split(",").filter((c) => c.length > 0) };
}

function union(current: string[], added: string[]): string[] {
  return [...new Set([...current, ...added])];
}

function difference(current: string[], removed: string[]): string[] {
  const drop = new Set(removed);
  return current.filter((c) => !drop.has(c));
}
