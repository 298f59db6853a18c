// Control server: TCP listener, one ControlSession per accepted connection.

import net from "node:net";
import type { ConnectionRegistry } from "./registry.js";
import { ControlSession } from "./session.js";
import { errorMessage, log } from "./log.js";
import { socketTransport } from "./transport.js";

export interface ControlServerOptions {
  host: string;
  port: number;
  secret: string;
  registry: ConnectionRegistry;
  verbose?: boolean;
  /** Called with errors that are not the session's fault (failed config writes). */
  onFatal?: (err: Error) => void;
}

export class ControlServer {
  private instance: net.Server | null = null;
  private readonly sessions = new Set<ControlSession>();

  constructor(private readonly opts: ControlServerOptions) {}

  get sessionCount(): number {
    return this.sessions.size;
  }

  async start(): Promise<net.AddressInfo> {
    if (this.instance) throw new Error("Control server already started");
    const srv = net.createServer((socket) => { this.handleConnection(socket); });
    this.instance = srv;

    try {
      await new Promise<void>((resolve, reject) => {
        srv.once("error", reject);
        srv.listen(this.opts.port, this.opts.host, () => {
          srv.off("error", reject);
          resolve();
        });
      });
    } catch (err) {
      // Leave the server restartable after e.g. EADDRINUSE.
      this.instance = null;
      throw err;
    }

    const address = srv.address();
    if (address === null || typeof address === "string") {
      throw new Error("Control server is not bound to a TCP address");
    }
    log.info("daemon", `** Listening for control connections on ${address.address}:${address.port}`);
    return address;
  }

  async stop(): Promise<void> {
    for (const session of this.sessions) session.close();
    this.sessions.clear();
    if (!this.instance) return;
    const srv = this.instance;
    this.instance = null;
    await new Promise<void>((resolve) => srv.close(() => resolve()));
  }

  // --- Per-connection handling ---

  private handleConnection(socket: net.Socket): void {
    const session = new ControlSession({
      secret: this.opts.secret,
      registry: this.opts.registry,
      transport: socketTransport(socket),
      peer: `${socket.remoteAddress ?? "?"}:${socket.remotePort ?? "?"}`,
      verbose: this.opts.verbose,
    });
    this.sessions.add(session);

    socket.on("data", (chunk: Buffer) => {
      try {
        session.feed(chunk);
      } catch (err) {
        log.error("control", `** Request failed: ${errorMessage(err)}`);
        session.close();
        this.fatal(err);
      }
    });

    socket.on("error", (err) => {
      log.debug("control", `** Socket error from ${session.peer}: ${err.message}`);
    });

    socket.on("close", () => {
      session.transportClosed();
      this.sessions.delete(session);
    });
  }

  private fatal(err: unknown): void {
    const error = err instanceof Error ? err : new Error(String(err));
    if (this.opts.onFatal) {
      this.opts.onFatal(error);
      return;
    }
    throw error;
  }
}
