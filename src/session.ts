// session.ts — one control-socket connection
// Requests are authenticated one by one; any protocol violation closes the
// connection without a response. Pushes share the socket with responses in
// the order they are produced.

import type { EventHandler } from "./bus.js";
import { DEFAULT_IRC_PORT, isValidPort } from "./config.js";
import { ProtocolViolation, RpcMethodError } from "./errors.js";
import { LineFramer } from "./framer.js";
import { log } from "./log.js";
import {
  ERROR_CODES,
  METHODS,
  decodeLine,
  isMethod,
  makeErrorResponse,
  makePush,
  makeResponse,
  validateRequest,
  type Method,
  type RpcResponse,
} from "./protocol.js";
import type { AddNetworkParams, ConnectionRegistry } from "./registry.js";
import type { Transport } from "./transport.js";

export interface SessionOptions {
  secret: string;
  registry: ConnectionRegistry;
  transport: Transport;
  peer?: string;
  verbose?: boolean;
}

type Params = Record<string, unknown>;

// Marks a method that answers by closing the session.
const NO_RESPONSE = Symbol("no-response");

const utf8 = new TextDecoder("utf-8", { fatal: true });

export class ControlSession {
  private _subscribed = false;
  private _closed = false;
  private readonly framer = new LineFramer((line) => this.lineReceived(line));
  private readonly secret: string;
  private readonly registry: ConnectionRegistry;
  private readonly transport: Transport;
  private readonly verbose: boolean;
  readonly peer: string;

  // One stable reference per session so unsubscribe finds it again.
  readonly pushHandler: EventHandler = (event) => {
    this.out(makePush(event.network, event.message));
  };

  constructor(opts: SessionOptions) {
    this.secret = opts.secret;
    this.registry = opts.registry;
    this.transport = opts.transport;
    this.peer = opts.peer ?? "unknown";
    this.verbose = opts.verbose ?? false;
    log.info("control", `** New control connection from ${this.peer}`);
  }

  get subscribed(): boolean {
    return this._subscribed;
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Feeds raw bytes from the control socket. Protocol violations close the
   * session; any other error (a failed config write) is rethrown.
   */
  feed(chunk: Uint8Array): void {
    if (this._closed) return;
    this.framer.push(chunk);
  }

  /** Closes the transport and drops every subscription this session holds. */
  close(): void {
    if (this._closed) return;
    this.detach();
    this.transport.close();
  }

  /** The transport closed underneath the session. */
  transportClosed(): void {
    if (this._closed) return;
    this.detach();
  }

  private detach(): void {
    this._closed = true;
    this.registry.unsubscribeAll(this.pushHandler);
    this._subscribed = false;
    log.info("control", `** Control connection closed (${this.peer})`);
  }

  // --- Line handling ---

  private lineReceived(raw: Buffer): void {
    if (this._closed) return;
    try {
      const output = this.handleLine(raw);
      if (output !== null && !this._closed) this.out(output);
    } catch (err) {
      if (!(err instanceof ProtocolViolation)) throw err;
      log.debug("control", `** Protocol violation from ${this.peer}: ${err.message}`);
      this.close();
    }
  }

  private handleLine(raw: Buffer): RpcResponse | RpcResponse[] | null {
    let line: string;
    try {
      line = utf8.decode(raw);
    } catch {
      throw new ProtocolViolation("request is not valid UTF-8");
    }

    const incoming = decodeLine(line);
    if (incoming.kind === "single") return this.dispatch(incoming.request);

    const responses: RpcResponse[] = [];
    for (const request of incoming.requests) {
      const resp = this.dispatch(request);
      if (this._closed) return null;
      if (resp !== null) responses.push(resp);
    }
    return responses;
  }

  private dispatch(raw: unknown): RpcResponse | null {
    const req = validateRequest(raw);
    if (typeof req.params.secret !== "string" || req.params.secret !== this.secret) {
      throw new ProtocolViolation("bad secret");
    }
    if (!isMethod(req.method)) throw new ProtocolViolation(`unknown method ${req.method}`);

    const id = req.id ?? null;
    try {
      const result = this.route(req.method, req.params);
      return result === NO_RESPONSE ? null : makeResponse(id, result);
    } catch (err) {
      if (err instanceof RpcMethodError) return makeErrorResponse(id, err.rpcCode, err.message);
      throw err;
    }
  }

  // --- Request routing ---

  private route(method: Method, params: Params): unknown {
    switch (method) {
      case METHODS.CONTROL_DISCONNECT:
        this.close();
        return NO_RESPONSE;
      case METHODS.NETWORK_ADD:
        return this.networkAdd(params);
      case METHODS.NETWORK_DELETE:
        return this.networkDelete(params);
      case METHODS.NETWORK_GET:
        return this.registry.networks();
      case METHODS.NETWORK_SEND:
        return this.networkSend(params);
      case METHODS.STREAM_START:
        return this.streamStart();
      case METHODS.STREAM_STOP:
        return this.streamStop();
    }
  }

  private networkAdd(params: Params): string {
    const add = parseAddParams(params);
    this.registry.add(add, this._subscribed ? this.pushHandler : undefined);
    log.info("control", `** Added network ${add.name} (${add.host}:${add.port ?? DEFAULT_IRC_PORT})`);
    return "success";
  }

  private networkDelete(params: Params): string {
    const name = params.name;
    if (typeof name !== "string" || !this.registry.delete(name)) {
      throw new RpcMethodError(
        ERROR_CODES.UNKNOWN_NETWORK_DELETE,
        `network.delete: unknown network ${quote(name)}`,
      );
    }
    log.info("control", `** Deleted network ${name}`);
    return "success";
  }

  private networkSend(params: Params): string {
    const name = params.name;
    if (typeof name !== "string" || !this.registry.has(name)) {
      throw new RpcMethodError(
        ERROR_CODES.UNKNOWN_NETWORK_SEND,
        `network.send: unknown network ${quote(name)}`,
      );
    }
    const message = params.message;
    if (typeof message !== "string") throw new ProtocolViolation("network.send: message must be a string");
    this.registry.send(name, message);
    return "success";
  }

  private streamStart(): string {
    if (this.verbose) log.info("control", "** Controller requested to start the stream");
    this._subscribed = true;
    this.registry.subscribeAll(this.pushHandler);
    return "success";
  }

  private streamStop(): string {
    if (this.verbose) log.info("control", "** Controller requested to stop the stream");
    this._subscribed = false;
    this.registry.unsubscribeAll(this.pushHandler);
    return "success";
  }

  private out(payload: unknown): void {
    if (this._closed) return;
    this.transport.write(JSON.stringify(payload) + "\n");
  }
}

// --- Param parsing ---

function parseAddParams(params: Params): AddNetworkParams {
  const { name, host, nick, user, realname, port } = params;
  if (typeof name !== "string" || name.length === 0) throw new ProtocolViolation("network.add: name is required");
  if (typeof host !== "string" || host.length === 0) throw new ProtocolViolation("network.add: host is required");
  if (typeof nick !== "string" || nick.length === 0) throw new ProtocolViolation("network.add: nick is required");
  if (typeof user !== "string" || user.length === 0) throw new ProtocolViolation("network.add: user is required");
  if (typeof realname !== "string") throw new ProtocolViolation("network.add: realname is required");
  let ircPort: number | undefined;
  if (port !== undefined) {
    if (!isValidPort(port)) throw new ProtocolViolation("network.add: port must be 1-65535");
    ircPort = port;
  }
  return { name, host, nick, user, realname, port: ircPort };
}

function quote(value: unknown): string {
  return typeof value === "string" ? `'${value}'` : String(value);
}
