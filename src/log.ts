// log.ts — leveled stderr logging for the gateway daemon
// Format: <ISO timestamp> <LEVEL> [<tag>] <message>

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: chalk.gray("DEBUG"),
  info: chalk.green("INFO "),
  warn: chalk.yellow("WARN "),
  error: chalk.red("ERROR"),
};

type Sink = (line: string) => void;

const _log: { verbose: boolean; sink: Sink } = {
  verbose: false,
  sink: (line) => { process.stderr.write(line + "\n"); },
};

export function setVerbose(verbose: boolean): void {
  _log.verbose = verbose;
}

export function isVerbose(): boolean {
  return _log.verbose;
}

/** Redirect log output (tests capture lines instead of writing to stderr). */
export function setLogSink(sink: Sink | null): void {
  _log.sink = sink ?? ((line) => { process.stderr.write(line + "\n"); });
}

function write(level: LogLevel, tag: string, message: string): void {
  if (level === "debug" && !_log.verbose) return;
  const ts = new Date().toISOString();
  _log.sink(`${ts} ${LEVEL_LABELS[level]} ${chalk.bold(`[${tag}]`)} ${message}`);
}

export const log = {
  debug: (tag: string, message: string) => write("debug", tag, message),
  info: (tag: string, message: string) => write("info", tag, message),
  warn: (tag: string, message: string) => write("warn", tag, message),
  error: (tag: string, message: string) => write("error", tag, message),
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
