/**
 * Unit tests for the scan service, against an in-process provider
 */

import { buildScanList, buildScanReport, scanDirection, scanTickers, TickerScan } from '../scanService';
import * as pipeline from '../../core/pipeline';
import { FakeProvider, barsFromCloses, baseConfig } from '../../testUtils/fixtures';
import { TickerAnalysis } from '../../types';

const rising = barsFromCloses(Array.from({ length: 30 }, (_, i) => 100 + i));
const falling = barsFromCloses(Array.from({ length: 30 }, (_, i) => 130 - i));
const short = barsFromCloses([10, 11, 12]);

const provider = () => new FakeProvider({ UP: rising, DOWN: falling, NEW: short });
const options = { years: 2, concurrency: 2, timeoutMs: 0 };

function analysis(overrides: Partial<TickerAnalysis>): TickerAnalysis {
  return {
    ticker: 'T',
    date: '2020-01-01',
    close: 10,
    regime: 'CLOUDY_BRIGHT',
    recovery: 'NONE',
    recommendation: 'HOLD',
    ...overrides,
  };
}

describe('buildScanList', () => {
  it('should union the curated lists with the holdings, sorted', () => {
    expect(buildScanList(['aapl', 'voo'], { us: ['VOO'], tw: ['0050.TW'] })).toEqual(['0050.TW', 'AAPL', 'VOO']);
  });
});

describe('scanTickers', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should analyze the latest bar of every ticker with one model', async () => {
    const outcomes = await scanTickers(provider(), ['UP', 'DOWN', 'NEW'], [baseConfig], options);

    expect(outcomes.map((o) => o.ticker)).toEqual(['DOWN', 'NEW', 'UP']);
    const byTicker = new Map(outcomes.map((o) => [o.ticker, o]));

    const up = byTicker.get('UP');
    expect(up?.ok && up.value.analyses[0]).toMatchObject({ regime: 'SUNNY', recovery: 'NONE', recommendation: 'HOLD' });
    expect(up?.ok && up.value.combined).toBeUndefined();

    const down = byTicker.get('DOWN');
    expect(down?.ok && down.value.analyses[0]).toMatchObject({ regime: 'RAINY', recommendation: 'EXIT' });

    const fresh = byTicker.get('NEW');
    expect(fresh?.ok && fresh.value.analyses[0]).toMatchObject({
      regime: 'INSUFFICIENT_DATA',
      recovery: 'INSUFFICIENT_DATA',
      recommendation: 'HOLD',
    });
  });

  it('should combine two models only when both are conclusive', async () => {
    const outcomes = await scanTickers(provider(), ['UP', 'DOWN', 'NEW'], [baseConfig, baseConfig], options);
    const combined = outcomes.map((o) => (o.ok ? o.value.combined : 'failed'));

    expect(combined).toEqual(['STRONG_SELL', undefined, 'HOLD']);
  });

  it('should pass the MACD signal span to every analysis', async () => {
    const analyze = jest.spyOn(pipeline, 'analyzeLatest');

    await scanTickers(provider(), ['UP'], [baseConfig, baseConfig], { ...options, macdSignalSpan: 'fast' });

    expect(analyze).toHaveBeenCalledTimes(2);
    expect(analyze).toHaveBeenCalledWith('UP', rising, baseConfig, { macdSignalSpan: 'fast' });
  });

  it('should report a failing ticker without stopping the others', async () => {
    const outcomes = await scanTickers(provider(), ['UP', 'GONE'], [baseConfig], options);

    expect(outcomes[0]).toEqual({
      ticker: 'GONE',
      ok: false,
      error: 'Failed to fetch data for GONE: no data returned',
    });
    expect(outcomes[1].ok).toBe(true);
  });

  it('should fetch each ticker once however many models run', async () => {
    const fake = provider();
    await scanTickers(fake, ['UP', 'DOWN'], [baseConfig, baseConfig], options);
    expect([...fake.calls].sort()).toEqual(['DOWN', 'UP']);
  });

  it('should refuse zero or more than two models', async () => {
    await expect(scanTickers(provider(), ['UP'], [], options)).rejects.toThrow('A scan takes one or two models, got 0');
    await expect(scanTickers(provider(), ['UP'], [baseConfig, baseConfig, baseConfig], options)).rejects.toThrow(
      'A scan takes one or two models, got 3'
    );
  });
});

describe('scanDirection', () => {
  it('should read a single model from its recommendation', () => {
    const scan = (recommendation: TickerAnalysis['recommendation']): TickerScan => ({
      ticker: 'T',
      date: '2020-01-01',
      close: 10,
      analyses: [analysis({ recommendation })],
    });

    expect(scanDirection(scan('ENTER'))).toBe(1);
    expect(scanDirection(scan('EXIT'))).toBe(-1);
    expect(scanDirection(scan('HOLD'))).toBe(0);
  });

  it('should read two models from the combined verdict', () => {
    const scan: TickerScan = {
      ticker: 'T',
      date: '2020-01-01',
      close: 10,
      analyses: [analysis({ recommendation: 'ENTER' }), analysis({})],
      combined: 'BUY',
    };

    expect(scanDirection(scan)).toBe(1);
    expect(scanDirection({ ...scan, combined: 'REDUCE' })).toBe(-1);
    expect(scanDirection({ ...scan, combined: undefined })).toBe(0);
  });
});

describe('buildScanReport', () => {
  function scan(ticker: string, recommendation: TickerAnalysis['recommendation'], combined?: TickerScan['combined']) {
    const analyses = combined
      ? [analysis({ ticker, recommendation }), analysis({ ticker, recommendation })]
      : [analysis({ ticker, recommendation })];
    return { ticker, ok: true as const, value: { ticker, date: '2020-01-01', close: 10, analyses, combined } };
  }

  it('should separate holdings from opportunities and failures', () => {
    const report = buildScanReport(
      [
        scan('AAA', 'ENTER'),
        scan('BBB', 'EXIT'),
        scan('HELD', 'EXIT'),
        { ticker: 'BAD', ok: false, error: 'boom' },
      ],
      ['held', 'MISSING']
    );

    expect(report.holdings.map((h) => [h.ticker, h.scan?.ticker, h.error])).toEqual([
      ['HELD', 'HELD', undefined],
      ['MISSING', undefined, 'not scanned'],
    ]);
    expect(report.buys.map((s) => s.ticker)).toEqual(['AAA']);
    expect(report.sells.map((s) => s.ticker)).toEqual(['BBB']);
    expect(report.failures).toEqual([{ ticker: 'BAD', error: 'boom' }]);
  });

  it('should list strong signals first', () => {
    const report = buildScanReport([scan('AAA', 'ENTER', 'BUY'), scan('BBB', 'ENTER', 'STRONG_BUY')], []);
    expect(report.buys.map((s) => s.ticker)).toEqual(['BBB', 'AAA']);
  });
});
