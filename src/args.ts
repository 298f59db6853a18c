// args.ts — flag and positional helpers for the CLI

// Flags that consume the next argument, so it is not read as a network name or message.
const VALUE_FLAGS = new Set(["--config", "--port", "--nick", "--user", "--realname"]);

/**
 * Bare arguments in order: the command, then e.g. network name and host for
 * `add`, or network name and raw IRC line for `send`.
 */
export function getPositionals(args: string[]): string[] {
  const positionals: string[] = [];
  const consumed = new Set<number>();
  args.forEach((arg, i) => {
    if (arg.startsWith("-")) {
      if (VALUE_FLAGS.has(arg)) consumed.add(i + 1);
    } else if (!consumed.has(i)) {
      positionals.push(arg);
    }
  });
  return positionals;
}

export function extractOption(args: string[], flag: string): string | undefined {
  const at = args.indexOf(flag);
  return at === -1 ? undefined : args[at + 1];
}

/** Integer flag such as `--port`; validity as a port is checked by the daemon. */
export function parseIntOption(args: string[], flag: string): number | undefined {
  const value = extractOption(args, flag);
  if (value === undefined) {
    if (args.includes(flag)) throw new Error(`${flag} requires a value`);
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) throw new Error(`${flag} must be an integer, got "${value}"`);
  return parsed;
}
