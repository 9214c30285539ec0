/**
 * Hold command: manage the hold list
 *   hold add TICKER...   hold del TICKER...   hold list
 */

import { ParsedArgs } from "./args";
import { CommandContext } from "./context";

const USAGE = "Usage: hold add|del <TICKER...> | hold list";

export function runHold(args: ParsedArgs, ctx: CommandContext): string[] {
  const [action, ...tickers] = args.positionals;

  switch (action) {
    case "add": {
      if (tickers.length === 0) throw new Error(USAGE);
      const change = ctx.holdList.add(tickers);
      for (const t of change.changed) ctx.print(`Added ${t}`);
      for (const t of change.unchanged) ctx.print(`${t} is already held`);
      break;
    }
    case "del": {
      if (tickers.length === 0) throw new Error(USAGE);
      const change = ctx.holdList.remove(tickers);
      for (const t of change.changed) ctx.print(`Removed ${t}`);
      for (const t of change.unchanged) ctx.print(`${t} is not in the hold list`);
      break;
    }
    case "list":
      break;
    default:
      throw new Error(USAGE);
  }

  const current = ctx.holdList.load();
  ctx.print(current.length > 0 ? `Held (${current.length}): ${current.join(", ")}` : "Hold list is empty.");
  return current;
}
