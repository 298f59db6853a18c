// transport.ts — socket seam between the gateway and node:net
// Clients dial through a Dialer so tests can substitute an in-memory one.

import net from "node:net";

export interface Transport {
  write(data: string): void;
  close(): void;
}

export interface TransportEvents {
  onOpen(): void;
  onData(chunk: Buffer): void;
  onClose(err?: Error): void;
}

export type Dialer = (host: string, port: number, events: TransportEvents) => Transport;

/** Wraps an already-connected socket (accepted control connections). */
export function socketTransport(socket: net.Socket): Transport {
  return {
    write: (data) => {
      if (!socket.destroyed && socket.writable) socket.write(data);
    },
    close: () => { socket.destroy(); },
  };
}

export const netDialer: Dialer = (host, port, events) => {
  const socket = net.createConnection({ host, port });
  let closed = false;
  let failure: Error | undefined;

  socket.on("connect", () => events.onOpen());
  socket.on("data", (chunk: Buffer) => events.onData(chunk));
  socket.on("error", (err) => { failure = err; });
  socket.on("close", () => {
    if (closed) return;
    closed = true;
    events.onClose(failure);
  });

  return socketTransport(socket);
};
