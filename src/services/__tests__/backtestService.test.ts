import { backtestTickers } from '../backtestService';
import { DEFAULT_METRICS_OPTIONS } from '../../core/metrics/performanceMetrics';
import { getStrategyProfile } from '../../core/strategy/strategyProfiles';
import { FakeProvider, barsFromCloses, baseConfig } from '../../testUtils/fixtures';

const rising = barsFromCloses(Array.from({ length: 30 }, (_, i) => 100 + i));
const falling = barsFromCloses(Array.from({ length: 30 }, (_, i) => 130 - i));

const provider = () => new FakeProvider({ UP: rising, DOWN: falling, TINY: barsFromCloses([10, 11, 12]) });

describe('BacktestService', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should backtest every ticker and collect failures, sorted by ticker', async () => {
    const { results, failures } = await backtestTickers(provider(), ['UP', 'TINY', 'GONE', 'DOWN'], {
      years: 1,
      config: baseConfig,
      profile: getStrategyProfile('conservative'),
      metrics: DEFAULT_METRICS_OPTIONS,
      concurrency: 3,
      timeoutMs: 0,
    });

    expect(results.map((r) => r.ticker)).toEqual(['DOWN', 'UP']);
    expect(results[0].buyAndHoldReturn).toBeCloseTo(101 / 126 - 1, 12);
    expect(failures).toEqual([
      { ticker: 'GONE', error: 'Failed to fetch data for GONE: no data returned' },
      { ticker: 'TINY', error: 'Insufficient data for TINY: need 5 bars, got 3' },
    ]);
  });
});
