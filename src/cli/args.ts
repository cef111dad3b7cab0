import { ConfigurationError } from "../core/errors.js";

export interface ParsedArgs {
  positionals: string[];
  flags: Map<string, string[]>;
  switches: Set<string>;
}

/**
 * `--name value` options (repeatable), `--name` switches from `switchNames`, and positionals.
 * Unknown options are rejected by the caller, which knows what it accepts.
 */
export function parseArgs(argv: readonly string[], switchNames: readonly string[]): ParsedArgs {
  const out: ParsedArgs = { positionals: [], flags: new Map(), switches: new Set() };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) continue;
    if (!a.startsWith("--")) {
      out.positionals.push(a);
      continue;
    }
    const key = a.slice(2);
    if (switchNames.includes(key)) {
      out.switches.add(key);
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) throw new ConfigurationError(`missing value for --${key}`);
    out.flags.set(key, [...(out.flags.get(key) ?? []), next]);
    i++;
  }
  return out;
}

export function lastFlag(args: ParsedArgs, key: string): string | undefined {
  const values = args.flags.get(key);
  return values?.[values.length - 1];
}

export function assertKnownOptions(args: ParsedArgs, known: readonly string[]): void {
  for (const key of [...args.flags.keys(), ...args.switches]) {
    if (!known.includes(key)) throw new ConfigurationError(`unknown option: --${key}`);
  }
}
