/**
 * Minimal argv parsing: `--key=value`, bare `--flag` and positionals
 */

import { MacdSignalSpan } from "../data/indicatorBuilders";

export interface ParsedArgs {
  positionals: string[];
  options: Map<string, string>;
  flags: Set<string>;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], options: new Map(), flags: new Set() };

  for (const arg of argv) {
    if (!arg.startsWith("--")) {
      parsed.positionals.push(arg);
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq === -1) {
      parsed.flags.add(arg.slice(2));
    } else {
      parsed.options.set(arg.slice(2, eq), arg.slice(eq + 1));
    }
  }

  return parsed;
}

export function stringOption(args: ParsedArgs, name: string, fallback: string): string {
  return args.options.get(name) ?? fallback;
}

/**
 * @throws Error when the value is not a positive integer
 */
export function intOption(args: ParsedArgs, name: string, fallback: number): number {
  const raw = args.options.get(name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`--${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Comma separated list, upper-cased; fallback when absent
 */
export function listOption(args: ParsedArgs, name: string, fallback: string[]): string[] {
  const raw = args.options.get(name);
  if (raw === undefined) {
    return fallback;
  }
  return raw
    .split(",")
    .map((t) => t.trim().toUpperCase())
    .filter((t) => t.length > 0);
}

export function macdSignalSpanOption(args: ParsedArgs): MacdSignalSpan {
  const raw = args.options.get("macd-signal-span") ?? "signal";
  if (raw !== "signal" && raw !== "fast") {
    throw new Error(`--macd-signal-span must be "signal" or "fast", got "${raw}"`);
  }
  return raw;
}
