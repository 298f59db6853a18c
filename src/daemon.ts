// Daemon process lifecycle: load (or generate) config, connect every
// network, serve the control socket until signalled.

import type { AddressInfo } from "node:net";
import { ConfigStore, generateConfig, getConfigPath } from "./config.js";
import { ConfigError } from "./errors.js";
import { errorMessage, log, setVerbose } from "./log.js";
import { ConnectionRegistry } from "./registry.js";
import { ControlServer } from "./server.js";
import { netDialer, type Dialer } from "./transport.js";

export interface DaemonOptions {
  configPath?: string;
  verbose?: boolean;
  dialer?: Dialer;
  onFatal?: (err: Error) => void;
}

export interface RunningDaemon {
  config: ConfigStore;
  registry: ConnectionRegistry;
  server: ControlServer;
  address: AddressInfo;
  stop(): Promise<void>;
}

export type BootResult =
  | { kind: "generated"; path: string }
  | { kind: "running"; daemon: RunningDaemon };

/**
 * Starts the gateway. A missing config file is generated instead and the
 * caller is expected to exit so the operator can edit it.
 */
export async function bootDaemon(opts: DaemonOptions = {}): Promise<BootResult> {
  const path = opts.configPath ?? getConfigPath();
  if (!ConfigStore.exists(path)) {
    log.info("daemon", "** No config file found");
    ConfigStore.create(path, generateConfig());
    log.info("daemon", `** I generated a new config file at ${path}`);
    log.info("daemon", "** Edit it and try again");
    return { kind: "generated", path };
  }

  const config = ConfigStore.open(path);
  const registry = new ConnectionRegistry(config, opts.dialer ?? netDialer);
  registry.start();

  const control = config.get("control");
  const server = new ControlServer({
    host: control.host,
    port: control.port,
    secret: control.secret,
    registry,
    verbose: opts.verbose,
    onFatal: opts.onFatal,
  });

  let address: AddressInfo;
  try {
    address = await server.start();
  } catch (err) {
    registry.closeAll();
    throw err;
  }

  let stopped = false;
  return {
    kind: "running",
    daemon: {
      config,
      registry,
      server,
      address,
      async stop() {
        if (stopped) return;
        stopped = true;
        registry.closeAll();
        await server.stop();
      },
    },
  };
}

// --- Foreground entry (irc-gateway daemon) ---

export async function runDaemonMain(opts: { configPath?: string; verbose: boolean }): Promise<number> {
  log.info("daemon", `** Starting up (pid=${process.pid})`);
  setVerbose(opts.verbose);
  if (opts.verbose) log.info("daemon", "** Verbose logging is turned on");

  let shutdown: (code: number) => void = (code) => process.exit(code);

  let boot: BootResult;
  try {
    boot = await bootDaemon({
      configPath: opts.configPath,
      verbose: opts.verbose,
      onFatal: (err) => {
        log.error("daemon", `Fatal: ${err.message}`);
        shutdown(1);
      },
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error("daemon", `** The config file is invalid: ${err.message}`);
      return 1;
    }
    throw err;
  }

  if (boot.kind === "generated") return 0;
  const daemon = boot.daemon;

  return new Promise<number>((resolve) => {
    shutdown = (code) => {
      log.info("daemon", "** Shutting down");
      daemon.stop().then(
        () => resolve(code),
        (err: unknown) => {
          log.error("daemon", `** Shutdown failed: ${errorMessage(err)}`);
          resolve(1);
        },
      );
    };
    process.once("SIGINT", () => shutdown(0));
    process.once("SIGTERM", () => shutdown(0));
  });
}
