import { ModelConfig } from "../config/config";

export type ParameterName = keyof ModelConfig;

/**
 * Sampling order. Fixed so a seeded run draws the same configs every time.
 */
export const PARAMETER_NAMES: readonly ParameterName[] = [
  "maShort",
  "maLong",
  "rsiWindow",
  "rsiOversold",
  "rsiBullThreshold",
  "rsiBearThreshold",
  "macdFast",
  "macdSlow",
  "macdSignal",
  "drawdownWindow",
  "drawdownNoRain",
  "adxPeriod",
  "adxThreshold",
  "bbWindow",
  "bbStdDev",
];

export type ParameterSpace = Record<ParameterName, readonly number[]>;

function range(start: number, end: number, step: number): number[] {
  const values: number[] = [];
  for (let v = start; v <= end; v += step) {
    values.push(v);
  }
  return values;
}

// Fine-tuning grid around the finetuned preset
export const DEFAULT_PARAMETER_SPACE: ParameterSpace = {
  maShort: range(30, 80, 10),
  maLong: range(120, 200, 20),
  rsiWindow: [14, 20, 25],
  rsiOversold: [30, 35],
  rsiBullThreshold: [50, 55],
  rsiBearThreshold: [40, 45],
  macdFast: [12, 15],
  macdSlow: [26, 30],
  macdSignal: [9, 12, 18],
  drawdownWindow: [200, 250, 300],
  drawdownNoRain: [-0.1, -0.12],
  adxPeriod: [14, 20],
  adxThreshold: [18, 20, 22],
  bbWindow: [20, 25],
  bbStdDev: [2, 2.5],
};

/**
 * Number of distinct configs the space can produce
 */
export function spaceSize(space: ParameterSpace): number {
  // An empty candidate list leaves the parameter out: one choice
  return PARAMETER_NAMES.reduce((n, name) => n * Math.max(1, space[name].length), 1);
}
