import { validateSeries } from '../seriesValidationService';
import { barsFromCloses } from '../../testUtils/fixtures';
import { Bar } from '../../types';

function bar(date: string, overrides: Partial<Bar> = {}): Bar {
  return { date, high: 11, low: 9, close: 10, volume: 100, ...overrides };
}

describe('SeriesValidationService', () => {
  it('should accept a clean daily series', () => {
    const result = validateSeries(barsFromCloses([10, 11, 12]));

    expect(result.isValid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it('should reject an empty series', () => {
    expect(validateSeries([])).toMatchObject({ isValid: false, errors: ['No bars provided'] });
  });

  it('should reject non-positive prices and inverted ranges', () => {
    const result = validateSeries([bar('2024-01-02', { close: 0 }), bar('2024-01-03', { high: 8, low: 9, close: 8.5 })]);

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      'Non-positive or non-finite price at 2024-01-02',
      'Invalid price: high (8) < low (9) at 2024-01-03',
    ]);
    expect(result.check.priceAnomalies).toBe(3);
  });

  it('should reject duplicate and out-of-order bars', () => {
    const result = validateSeries([bar('2024-01-03'), bar('2024-01-03'), bar('2024-01-02')]);

    expect(result.errors).toEqual([
      'Duplicate bar found at 2024-01-03',
      'Bars out of order: 2024-01-02 after 2024-01-03',
    ]);
    expect(result.check.duplicateBars).toBe(1);
    expect(result.check.orderViolations).toBe(1);
  });

  it('should only warn about closes outside the range and calendar gaps', () => {
    const result = validateSeries([bar('2024-01-02', { close: 12 }), bar('2024-01-20')]);

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([
      'Close price (12) outside high/low range at 2024-01-02',
      'Calendar gap of 18 days before 2024-01-20',
    ]);
  });
});
