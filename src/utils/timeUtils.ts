/**
 * Time utility functions
 */

export const MS_PER_DAY = 24 * 60 * 60 * 1000;
export const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Calendar date (YYYY-MM-DD) of an epoch-seconds timestamp, shifted by the
 * exchange's UTC offset so a bar lands on its local trading day
 */
export function toIsoDate(epochSeconds: number, gmtOffsetSeconds: number = 0): string {
  return new Date((epochSeconds + gmtOffsetSeconds) * 1000).toISOString().slice(0, 10);
}

/**
 * Epoch seconds `years` (calendar average) before `now`
 */
export function yearsAgoSeconds(years: number, now: number = Date.now()): number {
  return Math.floor((now - years * 365.25 * MS_PER_DAY) / 1000);
}

export function isOlderThan(timestampMs: number, maxAgeHours: number, now: number = Date.now()): boolean {
  return now - timestampMs > maxAgeHours * MS_PER_HOUR;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
