import { ModelConfig, validateModelConfig } from "./config";
import { StrategyProfileName } from "../core/strategy/strategyProfiles";

/**
 * Preset registry: every named model lives here.
 * Adding a model = adding one entry; lookups outside this set are rejected.
 */
export const MODEL_NAMES = ["conservative", "highWinrate", "finetuned", "aggressive"] as const;

export type ModelName = (typeof MODEL_NAMES)[number];

export interface ModelPreset {
  name: ModelName;
  description: string;
  profile: StrategyProfileName;
  config: ModelConfig;
}

const rawPresets: Record<ModelName, { description: string; profile: StrategyProfileName; config: unknown }> = {
  // Tuned for compounded return across the reference universe
  conservative: {
    description: "Maximum return, conservative exits",
    profile: "conservative",
    config: {
      maShort: 80,
      maLong: 240,
      rsiWindow: 30,
      rsiOversold: 30,
      rsiBullThreshold: 50,
      rsiBearThreshold: 40,
      macdFast: 12,
      macdSlow: 30,
      macdSignal: 18,
      drawdownWindow: 300,
      drawdownNoRain: -0.1,
      adxPeriod: 14,
      adxThreshold: 25,
      bbWindow: 20,
      bbStdDev: 2,
    },
  },
  highWinrate: {
    description: "Maximum win rate, conservative exits",
    profile: "conservative",
    config: {
      maShort: 60,
      maLong: 150,
      rsiWindow: 25,
      rsiOversold: 40,
      rsiBullThreshold: 60,
      rsiBearThreshold: 40,
      macdFast: 18,
      macdSlow: 35,
      macdSignal: 18,
      drawdownWindow: 350,
      drawdownNoRain: -0.15,
      adxPeriod: 25,
      adxThreshold: 30,
    },
  },
  finetuned: {
    description: "Maximum Sharpe ratio, conservative exits",
    profile: "conservative",
    config: {
      maShort: 30,
      maLong: 200,
      rsiWindow: 14,
      rsiOversold: 35,
      rsiBullThreshold: 55,
      rsiBearThreshold: 45,
      macdFast: 12,
      macdSlow: 30,
      macdSignal: 9,
      drawdownWindow: 300,
      drawdownNoRain: -0.1,
      adxPeriod: 14,
      adxThreshold: 20,
      bbWindow: 25,
      bbStdDev: 2,
    },
  },
  aggressive: {
    description: "Maximum return, aggressive exits",
    profile: "aggressive",
    config: {
      maShort: 50,
      maLong: 100,
      rsiWindow: 7,
      rsiOversold: 30,
      rsiBullThreshold: 60,
      rsiBearThreshold: 45,
      macdFast: 12,
      macdSlow: 18,
      macdSignal: 7,
      drawdownWindow: 250,
      drawdownNoRain: -0.05,
      adxPeriod: 10,
      adxThreshold: 20,
    },
  },
};

function buildPreset(name: ModelName): ModelPreset {
  const raw = rawPresets[name];
  return {
    name,
    description: raw.description,
    profile: raw.profile,
    config: validateModelConfig(raw.config, name),
  };
}

// Validated once at module load
export const modelPresets: Readonly<Record<ModelName, ModelPreset>> = Object.freeze({
  conservative: buildPreset("conservative"),
  highWinrate: buildPreset("highWinrate"),
  finetuned: buildPreset("finetuned"),
  aggressive: buildPreset("aggressive"),
});

export function isModelName(name: string): name is ModelName {
  return MODEL_NAMES.some((n) => n === name);
}

/**
 * Get a preset by name
 * @throws Error if the name is not registered
 */
export function getModelPreset(name: string): ModelPreset {
  if (!isModelName(name)) {
    throw new Error(`Model "${name}" not found. Available models: ${MODEL_NAMES.join(", ")}`);
  }
  return modelPresets[name];
}
