import { bollingerSettings, requiredLookback, validateModelConfig } from "../config";
import { MODEL_NAMES, getModelPreset, isModelName, modelPresets } from "../modelPresets";
import { getStrategyProfile } from "../../core/strategy/strategyProfiles";
import { baseConfig } from "../../testUtils/fixtures";
import { ConfigValidationError } from "../../utils/errors";

describe("validateModelConfig", () => {
  it("should reject maShort >= maLong up front", () => {
    expect(() => validateModelConfig({ ...baseConfig, maShort: 5, maLong: 5 }, "broken")).toThrow(
      'Invalid model config "broken": maShort: maShort must be less than maLong'
    );
  });

  it("should require both Bollinger fields or neither", () => {
    expect(() => validateModelConfig({ ...baseConfig, bbWindow: 20 })).toThrow(
      "bbWindow: bbWindow and bbStdDev must be configured together"
    );
  });

  it("should reject unknown keys and non-integer windows", () => {
    try {
      validateModelConfig({ ...baseConfig, maShort: 2.5, extra: 1 });
      throw new Error("expected validation to fail");
    } catch (error: unknown) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.configName).toBe("custom");
        expect(error.issues.some((issue) => issue.startsWith("maShort:"))).toBe(true);
        expect(error.issues.some((issue) => issue.startsWith("(root):"))).toBe(true);
      }
    }
  });

  it("should return a frozen config", () => {
    expect(Object.isFrozen(validateModelConfig({ ...baseConfig }))).toBe(true);
  });

  it("should expose Bollinger settings and the required lookback", () => {
    expect(bollingerSettings(baseConfig)).toBeUndefined();
    expect(bollingerSettings(validateModelConfig({ ...baseConfig, bbWindow: 20, bbStdDev: 2 }))).toEqual({
      window: 20,
      stdDev: 2,
    });
    expect(requiredLookback(baseConfig)).toBe(5);
    expect(requiredLookback(validateModelConfig({ ...baseConfig, drawdownWindow: 9 }))).toBe(9);
  });
});

describe("model presets", () => {
  it("should register every named model with a valid profile", () => {
    for (const name of MODEL_NAMES) {
      const preset = modelPresets[name];
      expect(preset.name).toBe(name);
      expect(preset.config.maShort).toBeLessThan(preset.config.maLong);
      expect(getStrategyProfile(preset.profile).name).toBe(preset.profile);
    }
  });

  it("should pair the aggressive model with aggressive exits", () => {
    expect(getModelPreset("aggressive").profile).toBe("aggressive");
    expect(getModelPreset("conservative").profile).toBe("conservative");
  });

  it("should resolve presets by name and reject unknown names", () => {
    expect(getModelPreset("finetuned")).toBe(modelPresets.finetuned);
    expect(isModelName("highWinrate")).toBe(true);
    expect(isModelName("turbo")).toBe(false);
    expect(() => getModelPreset("turbo")).toThrow(
      'Model "turbo" not found. Available models: conservative, highWinrate, finetuned, aggressive'
    );
  });
});

describe("strategy profiles", () => {
  it("should reject unknown profiles", () => {
    expect(() => getStrategyProfile("yolo")).toThrow(
      'Strategy profile "yolo" not found in registry. Available profiles: conservative, aggressive'
    );
  });
});
