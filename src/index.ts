#!/usr/bin/env node
/**
 * Main entry point for Market Barometer
 *
 *   diagnose <TICKER> [--model=]          latest barometer reading
 *   scan [--model=] [--extend]            holdings + opportunity scan
 *   hold add|del <TICKER...> | hold list  manage the hold list
 *   backtest [--model=] [--profile=] [--tickers=] [--years=] [--export]
 *   long-backtest [same options, 10 years by default]
 *   optimize [--objective=] [--trials=] [--seed=] [--profile=] [--tickers=] [--years=]
 */

import { parseArgs } from "./commands/args";
import { runBatchBacktest, runLongBacktest } from "./commands/backtest";
import { CommandContext, createDefaultContext } from "./commands/context";
import { runDiagnose } from "./commands/diagnose";
import { runHold } from "./commands/hold";
import { runOptimize } from "./commands/optimize";
import { runScan } from "./commands/scan";
import { globalConfig } from "./config/globalConfig";
import { MODEL_NAMES } from "./config/modelPresets";
import { errorMessage } from "./utils/errors";
import { logError, logger } from "./utils/logger";

const USAGE = [
  "Usage: market-barometer <command> [options]",
  "Commands: diagnose, scan, hold, backtest, long-backtest, optimize",
  `Models: ${MODEL_NAMES.join(", ")}`,
].join("\n");

export async function runCommand(argv: string[], ctx: CommandContext): Promise<void> {
  const [command, ...rest] = argv;
  const args = parseArgs(rest);

  switch (command) {
    case "diagnose":
      await runDiagnose(args, ctx);
      break;
    case "scan":
      await runScan(args, ctx);
      break;
    case "hold":
      runHold(args, ctx);
      break;
    case "backtest":
      await runBatchBacktest(args, ctx);
      break;
    case "long-backtest":
      await runLongBacktest(args, ctx);
      break;
    case "optimize":
      await runOptimize(args, ctx);
      break;
    default:
      throw new Error(command ? `Unknown command "${command}"\n${USAGE}` : USAGE);
  }
}

async function main() {
  logger.setLevel(globalConfig.logLevel);

  try {
    await runCommand(process.argv.slice(2), createDefaultContext());
  } catch (error: unknown) {
    logError("Command failed", { error: errorMessage(error) });
    console.error(errorMessage(error));
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
