import { buildIndicatorRows } from "../indicatorBuilders";
import { barsFromCloses, baseConfig, withConfig } from "../../testUtils/fixtures";

const closes = [10, 11, 10, 12, 13, 12, 14, 15];

describe("buildIndicatorRows", () => {
  it("should produce one row per bar carrying date and close", () => {
    const bars = barsFromCloses(closes);
    const rows = buildIndicatorRows(bars, baseConfig);

    expect(rows).toHaveLength(bars.length);
    rows.forEach((row, i) => {
      expect(row.date).toBe(bars[i].date);
      expect(row.close).toBe(closes[i]);
    });
  });

  it("should leave fields undefined until their lookback is satisfied", () => {
    const rows = buildIndicatorRows(barsFromCloses(closes), baseConfig);

    // maShort = 3, maLong = 5
    expect(rows[1].maShort).toBeUndefined();
    expect(rows[2].maShort).toBeCloseTo((10 + 11 + 10) / 3, 10);
    expect(rows[3].maLong).toBeUndefined();
    expect(rows[4].maLong).toBeCloseTo((10 + 11 + 10 + 12 + 13) / 5, 10);

    // Defined from the first bar
    expect(rows[0].drawdown).toBe(0);
    expect(rows[0].macdHist).toBe(0);

    // Needs a previous bar
    expect(rows[0].adx).toBeUndefined();
    expect(rows[1].adx).toBeDefined();
  });

  it("should omit band fields when Bollinger is not configured", () => {
    const rows = buildIndicatorRows(barsFromCloses(closes), baseConfig);
    expect("bbUpper" in rows[7]).toBe(false);
    expect("bbLower" in rows[7]).toBe(false);
  });

  it("should fill band fields when Bollinger is configured", () => {
    const config = withConfig({ bbWindow: 3, bbStdDev: 2, maShort: 1, maLong: 2 });
    const rows = buildIndicatorRows(barsFromCloses([1, 2, 3]), config);

    expect(rows[1].bbMiddle).toBeUndefined();
    expect(rows[2].bbMiddle).toBe(2);
    expect(rows[2].bbUpper).toBe(4);
    expect(rows[2].bbLower).toBe(0);
  });

  it("should smooth the signal line with macdFast when asked to", () => {
    const bars = barsFromCloses(closes);
    const viaFast = buildIndicatorRows(bars, baseConfig, { macdSignalSpan: "fast" });
    const viaSignal = buildIndicatorRows(bars, withConfig({ macdSignal: baseConfig.macdFast }));
    const standard = buildIndicatorRows(bars, baseConfig);

    expect(viaFast.map((r) => r.macdSignal)).toEqual(viaSignal.map((r) => r.macdSignal));
    expect(viaFast[7].macdSignal).not.toBe(standard[7].macdSignal);
  });
});
