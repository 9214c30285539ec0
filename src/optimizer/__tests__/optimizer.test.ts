import { AggregateStats, evaluateConfig, geometricMean, optimize, sampleConfig, scoreAggregate } from "../optimizer";
import { DEFAULT_PARAMETER_SPACE, ParameterSpace, spaceSize } from "../parameterSpace";
import { getStrategyProfile } from "../../core/strategy/strategyProfiles";
import { DEFAULT_METRICS_OPTIONS } from "../../core/metrics/performanceMetrics";
import { runBacktest } from "../../core/pipeline";
import { SeededRandom } from "../../utils/random";
import { barsFromCloses, baseConfig } from "../../testUtils/fixtures";
import { Bar } from "../../types";

const smallSpace: ParameterSpace = {
  maShort: [3, 4, 6],
  maLong: [5, 8],
  rsiWindow: [3, 5],
  rsiOversold: [30],
  rsiBullThreshold: [50],
  rsiBearThreshold: [40],
  macdFast: [2],
  macdSlow: [4, 6],
  macdSignal: [3],
  drawdownWindow: [5, 10],
  drawdownNoRain: [-0.05, -0.1],
  adxPeriod: [3],
  adxThreshold: [10, 20],
  bbWindow: [],
  bbStdDev: [],
};

function wave(length: number, phase: number): Bar[] {
  return barsFromCloses(
    Array.from({ length }, (_, i) => 100 + 15 * Math.sin((i + phase) / 6) + 0.2 * i)
  );
}

const universe = new Map<string, Bar[]>([
  ["AAA", wave(150, 0)],
  ["BBB", wave(150, 9)],
]);

const options = {
  objective: "max_return" as const,
  profile: getStrategyProfile("conservative"),
  metrics: DEFAULT_METRICS_OPTIONS,
  concurrency: 2,
};

describe("sampleConfig", () => {
  it("should reject a draw with maShort >= maLong", () => {
    const space: ParameterSpace = { ...smallSpace, maShort: [10], maLong: [5] };
    expect(sampleConfig(space, new SeededRandom(1))).toBeNull();
  });

  it("should leave out parameters with no candidates", () => {
    const config = sampleConfig({ ...smallSpace, maShort: [3] }, new SeededRandom(1));
    expect(config).not.toBeNull();
    expect(config?.bbWindow).toBeUndefined();
    expect(config?.bbStdDev).toBeUndefined();
  });

  it("should only draw values from the space", () => {
    const rng = new SeededRandom(5);
    for (let i = 0; i < 50; i++) {
      const config = sampleConfig(DEFAULT_PARAMETER_SPACE, rng);
      if (config) {
        expect(DEFAULT_PARAMETER_SPACE.maShort).toContain(config.maShort);
        expect(DEFAULT_PARAMETER_SPACE.bbStdDev).toContain(config.bbStdDev);
        expect(config.maShort).toBeLessThan(config.maLong);
      }
    }
  });
});

describe("spaceSize", () => {
  it("should count an empty candidate list as a single choice", () => {
    expect(spaceSize(smallSpace)).toBe(3 * 2 * 2 * 2 * 2 * 2 * 2);
  });
});

describe("scoreAggregate", () => {
  const aggregate: AggregateStats = {
    geometricReturn: 0.5,
    geometricAnnualized: 0.1,
    avgWinRate: 0.6,
    avgSharpe: 1.2,
    avgMaxDrawdown: -0.2,
    totalTrades: 10,
    tickerCount: 2,
  };

  it("should score each objective", () => {
    expect(scoreAggregate(aggregate, "max_return")).toBe(0.5);
    expect(scoreAggregate(aggregate, "high_winrate")).toBeCloseTo(0.9, 12);
    expect(scoreAggregate(aggregate, "max_sharpe")).toBe(1.2);
  });
});

describe("geometricMean", () => {
  it("should compound returns and take the n-th root", () => {
    expect(geometricMean([0.44, 0])).toBeCloseTo(0.2, 12);
    expect(geometricMean([0.1])).toBeCloseTo(0.1, 12);
  });

  it("should score a total loss as -1", () => {
    expect(geometricMean([-1, 0.5])).toBe(-1);
    expect(geometricMean([-1.5, 0.2])).toBe(-1);
  });
});

describe("evaluateConfig", () => {
  it("should combine per-ticker stats by geometric return and mean win rate", () => {
    const stats = [...universe].map(
      ([ticker, series]) => runBacktest(ticker, series, baseConfig, options.profile, { metrics: options.metrics }).stats
    );
    const product = stats.reduce((p, s) => p * (1 + s.totalReturn), 1);

    const aggregate = evaluateConfig(baseConfig, universe, options);

    expect(aggregate?.tickerCount).toBe(2);
    expect(aggregate?.geometricReturn).toBeCloseTo(Math.pow(product, 1 / 2) - 1, 12);
    expect(aggregate?.avgWinRate).toBeCloseTo((stats[0].winRate + stats[1].winRate) / 2, 12);
    expect(aggregate?.totalTrades).toBe(stats[0].totalTrades + stats[1].totalTrades);
  });

  it("should aggregate over every ticker long enough for the config", () => {
    const short = new Map(universe).set("TINY", wave(3, 0));
    const aggregate = evaluateConfig(baseConfig, short, options);

    expect(aggregate?.tickerCount).toBe(2);
  });

  it("should return null when no ticker is long enough", () => {
    expect(evaluateConfig(baseConfig, new Map([["TINY", wave(3, 0)]]), options)).toBeNull();
  });
});

describe("optimize", () => {
  beforeEach(() => {
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should replay the same trials for the same seed", async () => {
    const first = await optimize(universe, smallSpace, { ...options, trials: 12, seed: 99 });
    const second = await optimize(universe, smallSpace, { ...options, trials: 12, seed: 99 });

    expect(second.results).toEqual(first.results);
    expect(second.best).toEqual(first.best);
  });

  it("should account for every trial as evaluated or skipped", async () => {
    const result = await optimize(universe, smallSpace, { ...options, trials: 20, seed: 3 });

    expect(result.results.length + result.skipped).toBe(20);
    expect(result.results.map((r) => r.trial)).toEqual(
      [...result.results.map((r) => r.trial)].sort((a, b) => a - b)
    );
    for (const trial of result.results) {
      expect(trial.config.maShort).toBeLessThan(trial.config.maLong);
    }
  });

  it("should pick the highest score", async () => {
    const result = await optimize(universe, smallSpace, { ...options, trials: 20, seed: 3 });
    const top = Math.max(...result.results.map((r) => r.score));

    expect(result.best?.score).toBe(top);
  });

  it("should keep the earliest trial on a tie", async () => {
    const single: ParameterSpace = {
      ...smallSpace,
      maShort: [3],
      maLong: [5],
      rsiWindow: [3],
      macdSlow: [4],
      drawdownWindow: [5],
      drawdownNoRain: [-0.1],
      adxThreshold: [20],
    };
    const result = await optimize(universe, single, { ...options, trials: 4, seed: 1 });

    expect(result.results).toHaveLength(4);
    expect(result.best?.trial).toBe(1);
  });

  it("should skip every trial of an unordered space", async () => {
    const result = await optimize(universe, { ...smallSpace, maShort: [9], maLong: [5] }, {
      ...options,
      trials: 5,
      seed: 1,
    });

    expect(result).toEqual({ best: null, results: [], skipped: 5 });
  });
});
