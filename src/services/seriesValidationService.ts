/**
 * Series Validation Service
 * Checks a fetched bar series before it reaches the indicator pipeline
 */

import { Bar } from '../types';

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface DataQualityCheck {
  priceAnomalies: number;
  orderViolations: number;
  duplicateBars: number;
  calendarGaps: number;
}

// Tolerance for floating point rounding after split/dividend scaling
const EPS = 1e-9;
// Longest run of calendar days without a bar before it is worth a warning
const MAX_CALENDAR_GAP_DAYS = 10;

function daysBetween(a: string, b: string): number {
  return (Date.parse(`${b}T00:00:00Z`) - Date.parse(`${a}T00:00:00Z`)) / 86_400_000;
}

/**
 * Validate ordering and price sanity of a daily series.
 * Errors make the series unusable; warnings are informational.
 */
export function validateSeries(bars: Bar[]): ValidationResult & { check: DataQualityCheck } {
  const errors: string[] = [];
  const warnings: string[] = [];
  const check: DataQualityCheck = {
    priceAnomalies: 0,
    orderViolations: 0,
    duplicateBars: 0,
    calendarGaps: 0,
  };

  if (bars.length === 0) {
    errors.push('No bars provided');
    return { isValid: false, errors, warnings, check };
  }

  for (let i = 0; i < bars.length; i++) {
    const bar = bars[i];

    if (![bar.high, bar.low, bar.close].every((p) => Number.isFinite(p) && p > 0)) {
      check.priceAnomalies++;
      errors.push(`Non-positive or non-finite price at ${bar.date}`);
      continue;
    }
    if (bar.high < bar.low - EPS) {
      check.priceAnomalies++;
      errors.push(`Invalid price: high (${bar.high}) < low (${bar.low}) at ${bar.date}`);
    }
    if (bar.close < bar.low - EPS || bar.close > bar.high + EPS) {
      check.priceAnomalies++;
      warnings.push(`Close price (${bar.close}) outside high/low range at ${bar.date}`);
    }

    if (i === 0) {
      continue;
    }
    const prev = bars[i - 1];
    if (bar.date === prev.date) {
      check.duplicateBars++;
      errors.push(`Duplicate bar found at ${bar.date}`);
    } else if (bar.date < prev.date) {
      check.orderViolations++;
      errors.push(`Bars out of order: ${bar.date} after ${prev.date}`);
    } else if (daysBetween(prev.date, bar.date) > MAX_CALENDAR_GAP_DAYS) {
      check.calendarGaps++;
      warnings.push(`Calendar gap of ${daysBetween(prev.date, bar.date)} days before ${bar.date}`);
    }
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
    check,
  };
}
