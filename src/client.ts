// JSON-RPC client for the gateway control socket
// Used by cli.ts; pushes arriving between responses are handed to onPush.

import net from "node:net";
import type { ControlConfig } from "./config.js";
import { LineFramer } from "./framer.js";
import {
  isPush,
  isResponse,
  isRpcError,
  makeRequest,
  type PushNotification,
} from "./protocol.js";

export class GatewayRpcError extends Error {
  constructor(readonly code: number, message: string) {
    super(message);
    this.name = "GatewayRpcError";
  }
}

let _requestId = 0;
function nextId(): number {
  return ++_requestId;
}

/** 0.0.0.0 listens everywhere; dial loopback instead. */
export function dialHost(host: string): string {
  return host === "0.0.0.0" || host === "" ? "127.0.0.1" : host;
}

export class GatewayClient {
  private readonly pending = new Map<number, { resolve: (v: unknown) => void; reject: (e: Error) => void }>();
  private readonly framer = new LineFramer((line) => this.lineReceived(line.toString("utf-8")));
  private closed = false;

  onPush: (push: PushNotification) => void = () => {};

  private constructor(private readonly socket: net.Socket, private readonly secret: string) {
    let lastError: Error | undefined;
    socket.on("data", (chunk: Buffer) => this.framer.push(chunk));
    socket.on("error", (err) => { lastError = err; });
    socket.on("close", () => {
      const reason = lastError ? `Connection closed by gateway (${lastError.message})` : "Connection closed by gateway";
      this.failAll(new Error(reason));
    });
  }

  static connect(control: ControlConfig): Promise<GatewayClient> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: dialHost(control.host), port: control.port });
      socket.once("connect", () => {
        socket.off("error", reject);
        resolve(new GatewayClient(socket, control.secret));
      });
      socket.once("error", reject);
    });
  }

  /** Sends one request and resolves with its result; JSON-RPC errors reject with GatewayRpcError. */
  call(method: string, params: Record<string, unknown> = {}): Promise<unknown> {
    if (this.closed) return Promise.reject(new Error("Connection closed by gateway"));
    const id = nextId();
    const req = makeRequest(id, method, { ...params, secret: this.secret });
    return new Promise((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      this.socket.write(JSON.stringify(req) + "\n");
    });
  }

  /** Fire-and-forget request for methods that answer by closing (control.disconnect). */
  notify(method: string, params: Record<string, unknown> = {}): void {
    const req = makeRequest(nextId(), method, { ...params, secret: this.secret });
    this.socket.write(JSON.stringify(req) + "\n");
  }

  /** Resolves once the gateway (or we) closed the socket. */
  waitClosed(): Promise<void> {
    if (this.closed) return Promise.resolve();
    return new Promise((resolve) => this.socket.once("close", () => resolve()));
  }

  end(): void {
    this.socket.end();
  }

  private lineReceived(line: string): void {
    if (!line) return;
    let msg: unknown;
    try {
      msg = JSON.parse(line);
    } catch {
      this.failAll(new Error(`Gateway returned invalid JSON: ${line.slice(0, 200)}`));
      this.socket.destroy();
      return;
    }
    if (isPush(msg)) {
      this.onPush(msg);
      return;
    }
    if (!isResponse(msg) || typeof msg.id !== "number") return;
    const waiter = this.pending.get(msg.id);
    if (!waiter) return;
    this.pending.delete(msg.id);
    if (isRpcError(msg)) waiter.reject(new GatewayRpcError(msg.error.code, msg.error.message));
    else waiter.resolve(msg.result);
  }

  private failAll(err: Error): void {
    this.closed = true;
    for (const waiter of this.pending.values()) waiter.reject(err);
    this.pending.clear();
  }
}
