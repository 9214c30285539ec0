/**
 * Model configuration
 * Window lengths and thresholds consumed by the indicator pipeline,
 * the barometer and the recovery detector.
 */

import { z } from "zod";
import { ConfigValidationError } from "../utils/errors";

const windowLength = z.number().int().positive();
const threshold = z.number().finite();

export const ModelConfigSchema = z
  .object({
    // Moving averages
    maShort: windowLength,
    maLong: windowLength,

    // RSI
    rsiWindow: windowLength,
    rsiOversold: threshold,
    rsiBullThreshold: threshold,
    rsiBearThreshold: threshold,

    // MACD spans
    macdFast: windowLength,
    macdSlow: windowLength,
    macdSignal: windowLength,

    // Drawdown
    drawdownWindow: windowLength,
    drawdownNoRain: z.number().max(0), // e.g. -0.1 (10% below the trailing peak)

    // ADX
    adxPeriod: windowLength,
    adxThreshold: threshold,

    // Bollinger (optional, both or neither)
    bbWindow: windowLength.min(2).optional(),
    bbStdDev: z.number().positive().optional(),
  })
  .strict()
  .refine((c) => c.maShort < c.maLong, {
    message: "maShort must be less than maLong",
    path: ["maShort"],
  })
  .refine((c) => (c.bbWindow === undefined) === (c.bbStdDev === undefined), {
    message: "bbWindow and bbStdDev must be configured together",
    path: ["bbWindow"],
  });

export type ModelConfig = Readonly<z.infer<typeof ModelConfigSchema>>;

/**
 * Bollinger settings, present only when both fields are configured
 */
export function bollingerSettings(
  config: ModelConfig
): { window: number; stdDev: number } | undefined {
  if (config.bbWindow === undefined || config.bbStdDev === undefined) {
    return undefined;
  }
  return { window: config.bbWindow, stdDev: config.bbStdDev };
}

/**
 * Bars needed before a verdict is meaningful
 */
export function requiredLookback(config: ModelConfig): number {
  return Math.max(config.maLong, config.drawdownWindow);
}

/**
 * Validate a raw config and return a frozen copy
 * @throws ConfigValidationError when the schema or the ordering rules fail
 */
export function validateModelConfig(raw: unknown, name: string = "custom"): ModelConfig {
  const parsed = ModelConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigValidationError(name, issues);
  }
  return Object.freeze({ ...parsed.data });
}
