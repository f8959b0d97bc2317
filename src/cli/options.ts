import { HISTORY_TYPES, isHistoryType, type HistoryType } from "../types";

// Flags that take the following argument as their value
const VALUE_FLAGS = new Set(["type"]);

export interface CliOptions {
  args: string[];
  flags: Record<string, string | true>;
}

export function parseOptions(args: string[]): CliOptions {
  const opts: CliOptions = { args: [], flags: {} };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith("--")) {
      const key = arg.slice(2);
      const nextArg = args[i + 1];
      if (VALUE_FLAGS.has(key) && nextArg && !nextArg.startsWith("--")) {
        opts.flags[key] = nextArg;
        i++;
      } else {
        opts.flags[key] = true;
      }
    } else {
      opts.args.push(arg);
    }
  }
  return opts;
}

/** Media types named by the positional argument or --type; "all" by default. */
export function resolveTypes(opts: CliOptions): readonly HistoryType[] | null {
  const flag = opts.flags.type;
  const typeArg = opts.args[0] ?? (typeof flag === "string" ? flag : "all");
  if (typeArg === "all") return HISTORY_TYPES;
  return isHistoryType(typeArg) ? [typeArg] : null;
}
