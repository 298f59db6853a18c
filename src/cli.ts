#!/usr/bin/env node
// irc-gateway CLI — runs the daemon or talks to it over the control socket

import { ConfigStore, getConfigPath, type ControlConfig } from "./config.js";
import { GatewayClient } from "./client.js";
import { runDaemonMain } from "./daemon.js";
import { errorMessage } from "./log.js";
import { METHODS } from "./protocol.js";
import { extractOption, getPositionals, parseIntOption } from "./args.js";

function requireOption(args: string[], flag: string): string {
  const value = extractOption(args, flag);
  if (value === undefined) throw new Error(`${flag} is required`);
  return value;
}

function usage(): string {
  return `irc-gateway — persistent IRC connections behind a JSON-RPC control socket

DAEMON:
  daemon [-v|--verbose]          Run the gateway in the foreground

CLIENT:
  networks                       Print the configured networks
  add <name> <host> --nick <n> --user <u> --realname <r> [--port <p>]
  delete <name>                  Disconnect and forget a network
  send <name> <line...>          Send a raw IRC line
  stream                         Print every received line until interrupted
  disconnect                     Ask the gateway to close this control connection

OPTIONS:
  --config <path>                Config file (default ${getConfigPath()}, env IRC_GATEWAY_CONFIG)
`;
}

function print(data: unknown): void {
  process.stdout.write((typeof data === "string" ? data : JSON.stringify(data, null, 2)) + "\n");
}

function loadControl(args: string[]): ControlConfig {
  const path = extractOption(args, "--config") ?? getConfigPath();
  return ConfigStore.open(path).get("control");
}

async function withClient<T>(args: string[], fn: (client: GatewayClient) => Promise<T>): Promise<T> {
  const client = await GatewayClient.connect(loadControl(args));
  try {
    return await fn(client);
  } finally {
    client.end();
  }
}

// --- Commands ---

export async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;
  const positionals = getPositionals(rest);

  switch (command) {
    case "daemon":
      return runDaemonMain({
        configPath: extractOption(rest, "--config"),
        verbose: rest.includes("-v") || rest.includes("--verbose"),
      });

    case "networks":
      print(await withClient(rest, (c) => c.call(METHODS.NETWORK_GET)));
      return 0;

    case "add": {
      const [name, host] = positionals;
      if (!name || !host) throw new Error("add requires <name> <host>");
      const params: Record<string, unknown> = {
        name,
        host,
        nick: requireOption(rest, "--nick"),
        user: requireOption(rest, "--user"),
        realname: requireOption(rest, "--realname"),
      };
      const port = parseIntOption(rest, "--port");
      if (port !== undefined) params.port = port;
      print(await withClient(rest, (c) => c.call(METHODS.NETWORK_ADD, params)));
      return 0;
    }

    case "delete": {
      const [name] = positionals;
      if (!name) throw new Error("delete requires <name>");
      print(await withClient(rest, (c) => c.call(METHODS.NETWORK_DELETE, { name })));
      return 0;
    }

    case "send": {
      const [name, ...words] = positionals;
      if (!name || words.length === 0) throw new Error("send requires <name> <line...>");
      const message = words.join(" ");
      print(await withClient(rest, (c) => c.call(METHODS.NETWORK_SEND, { name, message })));
      return 0;
    }

    case "stream": {
      const client = await GatewayClient.connect(loadControl(rest));
      client.onPush = (push) => print(`[${push.params.network}] ${push.params.message}`);
      await client.call(METHODS.STREAM_START);
      process.once("SIGINT", () => client.end());
      await client.waitClosed();
      return 0;
    }

    case "disconnect":
      await withClient(rest, async (c) => {
        c.notify(METHODS.CONTROL_DISCONNECT);
        await c.waitClosed();
      });
      return 0;

    case undefined:
    case "help":
    case "--help":
    case "-h":
      print(usage());
      return command === undefined ? 1 : 0;

    default:
      throw new Error(`Unknown command: ${command}\n\n${usage()}`);
  }
}

main(process.argv.slice(2)).then(
  (code) => { process.exitCode = code; },
  (err: unknown) => {
    process.stderr.write(`[irc-gateway] ${errorMessage(err)}\n`);
    process.exitCode = 1;
  },
);
