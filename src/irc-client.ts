// irc-client.ts — one persistent connection to an IRC network
// connecting → registering (NICK/USER sent) → ready (376 seen) → disconnected

import { SubscriptionBus, type EventHandler } from "./bus.js";
import type { NetworkConfig } from "./config.js";
import { DecodeError } from "./errors.js";
import { LineFramer } from "./framer.js";
import { isVerbose, log } from "./log.js";
import type { Dialer, Transport } from "./transport.js";

export type ClientState = "idle" | "connecting" | "registering" | "ready" | "disconnected";

const END_OF_MOTD = "376";

const utf8 = new TextDecoder("utf-8", { fatal: true });

export class NetworkClient {
  private _state: ClientState = "idle";
  private transport: Transport | null = null;
  private readonly framer = new LineFramer((line) => this.lineReceived(line));
  private readonly bus = new SubscriptionBus((err) => this.reportError(err));
  // Lines sent before the socket opens; flushed after NICK/USER. No cap.
  private queue: string[] = [];

  constructor(
    readonly name: string,
    private config: NetworkConfig,
    private readonly dialer: Dialer,
    private readonly onError: (err: Error) => void = (err) => log.error(name, err.message),
  ) {}

  get state(): ClientState {
    return this._state;
  }

  get subscriberCount(): number {
    return this.bus.size;
  }

  /** The config snapshot used for the handshake and for channel joins on 376. */
  get snapshot(): NetworkConfig {
    return { ...this.config, channels: [...this.config.channels] };
  }

  updateConfig(config: NetworkConfig): void {
    this.config = { ...config, channels: [...config.channels] };
  }

  connect(): void {
    if (this._state !== "idle") return;
    this._state = "connecting";
    log.debug(this.name, `** Connecting to ${this.config.host}:${this.config.port}`);
    this.transport = this.dialer(this.config.host, this.config.port, {
      onOpen: () => this.connectionMade(),
      onData: (chunk) => this.guard(() => this.dataReceived(chunk)),
      onClose: (err) => this.connectionLost(err),
    });
  }

  disconnect(): void {
    if (this._state === "disconnected") return;
    this._state = "disconnected";
    this.queue = [];
    const transport = this.transport;
    this.transport = null;
    transport?.close();
  }

  subscribe(handler: EventHandler): void {
    this.bus.subscribe(handler);
  }

  unsubscribe(handler: EventHandler): void {
    this.bus.unsubscribe(handler);
  }

  isSubscribed(handler: EventHandler): boolean {
    return this.bus.has(handler);
  }

  /** Writes one raw line plus CRLF. Empty lines are dropped. */
  send(line: string | null | undefined): void {
    if (!line) return;
    switch (this._state) {
      case "idle":
      case "connecting":
        this.queue.push(line);
        return;
      case "disconnected":
        log.warn(this.name, `** Not connected, dropping ${JSON.stringify(line)}`);
        return;
      default:
        this.write(line);
    }
  }

  // --- Transport callbacks ---

  private connectionMade(): void {
    if (this._state !== "connecting") return;
    this._state = "registering";
    log.info(this.name, `** Connection made to ${this.config.host}:${this.config.port}`);
    this.write(`NICK ${this.config.nick}`);
    this.write(`USER ${this.config.user} ${this.config.host} x :${this.config.realname}`);
    const queued = this.queue;
    this.queue = [];
    for (const line of queued) this.write(line);
  }

  /** Feeds raw bytes from the network. Throws DecodeError after tearing down. */
  dataReceived(chunk: Uint8Array): void {
    if (this._state === "disconnected") return;
    this.framer.push(chunk);
  }

  private connectionLost(err?: Error): void {
    const wasOpen = this._state !== "disconnected";
    this._state = "disconnected";
    this.transport = null;
    this.queue = [];
    if (!wasOpen) return;
    if (err) log.warn(this.name, `** Connection lost: ${err.message}`);
    else log.info(this.name, "** Connection lost");
  }

  // Errors from socket callbacks go to onError rather than the event loop.
  private guard(fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.reportError(err);
    }
  }

  private reportError(err: unknown): void {
    this.onError(err instanceof Error ? err : new Error(String(err)));
  }

  // --- Line handling ---

  private lineReceived(raw: Buffer): void {
    if (isVerbose()) log.debug(this.name, `<= ${JSON.stringify(raw.toString("latin1"))}`);
    const line = this.decode(raw);

    this.bus.publish({ network: this.name, message: line });
    // A subscriber may have deleted this network.
    if (this._state === "disconnected") return;

    const tokens = line.split(/\s+/).filter((t) => t.length > 0);
    if (tokens[0] === "PING") {
      const origin = line.trimStart().slice("PING".length).trim();
      this.send(origin ? `PONG ${origin}` : "PONG");
    } else if (tokens.length > 1 && tokens[1] === END_OF_MOTD) {
      this._state = "ready";
      this.joinSavedChannels();
    }
  }

  private decode(raw: Buffer): string {
    try {
      return utf8.decode(raw);
    } catch {
      log.warn(this.name, "** Failed decode using utf-8.");
    }
    try {
      return latin1(raw);
    } catch (cause) {
      log.error(this.name, "** Failed decode using iso-8859-1.");
      log.error(this.name, raw.toString("hex"));
      this.disconnect();
      throw new DecodeError(this.name, raw, { cause });
    }
  }

  private joinSavedChannels(): void {
    for (const channel of this.config.channels) this.send(`JOIN ${channel}`);
  }

  private write(line: string): void {
    if (!this.transport) return;
    log.debug(this.name, `=> ${JSON.stringify(line + "\r\n")}`);
    this.transport.write(`${line}\r\n`);
  }
}

function latin1(raw: Buffer): string {
  return raw.toString("latin1");
}
