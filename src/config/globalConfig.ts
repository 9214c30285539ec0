/**
 * Global configuration shared across all commands
 * Infrastructure and evaluation settings that don't vary per model
 */

import * as os from "os";
import { LogLevel } from "../utils/logger";

export interface GlobalConfig {
  // Market data provider
  provider: {
    baseUrl: string;          // e.g., "https://query1.finance.yahoo.com"
    requestTimeoutMs: number;
    requestDelayMs: number;   // Pause after each request (rate limiting)
  };

  // Cache infrastructure
  cache: {
    enabled: boolean;
    directory: string;
    maxAgeHours: number;      // Older cache files are refetched
  };

  // Hold list persistence
  holdList: {
    file: string;
  };

  // Per-ticker fan-out
  workers: {
    count: number;            // Pool size, derived from available cores
    taskTimeoutMs: number;    // Deadline for one ticker's unit of work
  };

  // Performance evaluation
  evaluation: {
    riskFreeRate: number;       // Annual, e.g. 0.02
    tradingDaysPerYear: number; // e.g. 252
  };

  // Parameter search
  optimizer: {
    trials: number;
    universe: string[];
    years: number;
  };

  logLevel: LogLevel;
}

function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value ?? "").toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

export const globalConfig: GlobalConfig = {
  provider: {
    baseUrl: "https://query1.finance.yahoo.com",
    requestTimeoutMs: 15_000,
    requestDelayMs: 100,
  },
  cache: {
    enabled: true,
    directory: "data/cache",
    maxAgeHours: 24,
  },
  holdList: {
    file: "hold_list.txt",
  },
  workers: {
    count: Math.max(1, Math.min(10, os.cpus().length)),
    taskTimeoutMs: 60_000,
  },
  evaluation: {
    riskFreeRate: 0.02,
    tradingDaysPerYear: 252,
  },
  optimizer: {
    trials: 100,
    universe: ["0050.TW", "006208.TW", "VOO", "QQQ"],
    years: 5,
  },
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
};
