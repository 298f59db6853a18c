// config.ts — persisted gateway configuration
// File: ~/.config/irc-gateway/config.json (override: IRC_GATEWAY_CONFIG)
// Every mutation rewrites the whole file synchronously through a temp file + rename.

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import { ConfigError } from "./errors.js";

export interface ControlConfig {
  secret: string;
  host: string;
  port: number;
}

export interface NetworkConfig {
  host: string;
  port: number;
  nick: string;
  user: string;
  realname: string;
  channels: string[];
}

export type NetworkMap = Record<string, NetworkConfig>;

export interface GatewayConfig {
  control: ControlConfig;
  networks: NetworkMap;
}

export type ConfigKey = keyof GatewayConfig;

export const DEFAULT_IRC_PORT = 6667;
const CONTROL_PORT_MIN = 49152;
const CONTROL_PORT_MAX = 65535;

export function getConfigPath(): string {
  const override = process.env.IRC_GATEWAY_CONFIG;
  return override && override.length > 0
    ? override
    : join(homedir(), ".config", "irc-gateway", "config.json");
}

// --- Validation ---

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isValidPort(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 && value <= 65535;
}

function requireString(obj: Json, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string") throw new Error(`${where}.${key} must be a string`);
  return value;
}

function requirePort(obj: Json, key: string, where: string): number {
  const value = obj[key];
  if (!isValidPort(value)) throw new Error(`${where}.${key} must be a port number`);
  return value;
}

export function parseNetworkConfig(raw: unknown, where: string): NetworkConfig {
  if (!isObject(raw)) throw new Error(`${where} must be an object`);
  const channels = raw.channels ?? [];
  if (!Array.isArray(channels) || !channels.every((c): c is string => typeof c === "string")) {
    throw new Error(`${where}.channels must be a list of strings`);
  }
  return {
    host: requireString(raw, "host", where),
    port: requirePort(raw, "port", where),
    nick: requireString(raw, "nick", where),
    user: requireString(raw, "user", where),
    realname: requireString(raw, "realname", where),
    channels: uniq(channels),
  };
}

export function parseGatewayConfig(raw: unknown): GatewayConfig {
  if (!isObject(raw)) throw new Error("top level must be an object");
  const control = raw.control;
  if (!isObject(control)) throw new Error("control must be an object");
  const networks = raw.networks ?? {};
  if (!isObject(networks)) throw new Error("networks must be an object");

  // fromEntries defines own properties, so a network named "__proto__" survives.
  const parsed: NetworkMap = Object.fromEntries(
    Object.entries(networks).map(([name, net]) => [name, parseNetworkConfig(net, `networks.${name}`)]),
  );
  return {
    control: {
      secret: requireString(control, "secret", "control"),
      host: requireString(control, "host", "control"),
      port: requirePort(control, "port", "control"),
    },
    networks: parsed,
  };
}

function uniq(values: string[]): string[] {
  return [...new Set(values)];
}

// --- Store ---

export class ConfigStore {
  private constructor(readonly path: string, private data: GatewayConfig) {}

  /** Loads and validates an existing file. Throws ConfigError on bad JSON or shape. */
  static open(path: string): ConfigStore {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err) {
      if (err instanceof SyntaxError) throw new ConfigError(path, `invalid JSON (${err.message})`);
      throw err;
    }
    try {
      return new ConfigStore(path, parseGatewayConfig(raw));
    } catch (err) {
      throw new ConfigError(path, err instanceof Error ? err.message : String(err));
    }
  }

  /** Writes `config` to `path` and returns a store over it. */
  static create(path: string, config: GatewayConfig): ConfigStore {
    const store = new ConfigStore(path, config);
    store.flush();
    return store;
  }

  static exists(path: string): boolean {
    return existsSync(path);
  }

  get<K extends ConfigKey>(key: K): GatewayConfig[K] {
    return clone(this.data[key]);
  }

  set<K extends ConfigKey>(key: K, value: GatewayConfig[K]): void {
    const next: GatewayConfig = { ...this.data };
    next[key] = clone(value);
    this.data = next;
    this.flush();
  }

  /** Drops every network; `control` is required and has no empty form. */
  remove(key: "networks"): void {
    this.set(key, {});
  }

  get secret(): string {
    return this.data.control.secret;
  }

  networks(): NetworkMap {
    return this.get("networks");
  }

  network(name: string): NetworkConfig | undefined {
    if (!this.hasNetwork(name)) return undefined;
    return clone(this.data.networks[name]);
  }

  hasNetwork(name: string): boolean {
    return Object.hasOwn(this.data.networks, name);
  }

  putNetwork(name: string, config: NetworkConfig): NetworkConfig {
    const networks = { ...this.data.networks, [name]: clone(config) };
    this.set("networks", networks);
    return clone(config);
  }

  /** Applies `fn` to a copy of the named network, persists and returns the result. */
  updateNetwork(name: string, fn: (current: NetworkConfig) => NetworkConfig): NetworkConfig {
    const current = this.network(name);
    if (!current) throw new Error(`Unknown network: "${name}"`);
    return this.putNetwork(name, fn(current));
  }

  deleteNetwork(name: string): void {
    if (!this.hasNetwork(name)) return;
    const networks = { ...this.data.networks };
    delete networks[name];
    this.set("networks", networks);
  }

  private flush(): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.${process.pid}.tmp`;
    writeFileSync(tmp, JSON.stringify(sortKeys(this.data), null, 2) + "\n", "utf-8");
    renameSync(tmp, this.path);
  }
}

// --- First-run config ---

export function generateConfig(random: () => number = Math.random): GatewayConfig {
  const secret = uuidv4();
  const nick = "i" + secret.slice(0, 7);
  const span = CONTROL_PORT_MAX - CONTROL_PORT_MIN + 1;
  return {
    control: {
      secret,
      host: "0.0.0.0",
      port: CONTROL_PORT_MIN + Math.floor(random() * span),
    },
    networks: {
      libera: {
        host: "irc.libera.chat",
        port: DEFAULT_IRC_PORT,
        nick,
        user: nick,
        realname: nick,
        channels: [`#${nick}`],
      },
    },
  };
}

// --- Helpers ---

function clone<T>(value: T): T {
  return structuredClone(value);
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isObject(value)) {
    return Object.fromEntries(
      Object.keys(value).sort().map((key) => [key, sortKeys(value[key])]),
    );
  }
  return value;
}
