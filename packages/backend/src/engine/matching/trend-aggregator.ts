import type { Asset, UsageLog } from '../../snapshot/types.js';
import { compareIds } from './order.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Below this many hours per day on average an asset counts as idle (10% of a day). */
export const IDLE_DAILY_HOURS = 2.4;
export const PEAK_DAY_LIMIT = 5;

export interface TrendRequest {
  /** Inclusive UTC day range; times of day are ignored. */
  from: Date;
  to: Date;
  windowDays: number;
  stepDays?: number;
  assetId?: string;
}

export interface TrendPoint {
  /** YYYY-MM-DD, first day of the window. */
  readonly windowStart: string;
  /** YYYY-MM-DD, last day of the window (inclusive). */
  readonly windowEnd: string;
  readonly totalHours: number;
  readonly averageDailyHours: number;
}

export interface PeakDay {
  readonly date: string;
  readonly totalHours: number;
}

export interface UtilizationTrend {
  readonly points: TrendPoint[];
  readonly peakDays: PeakDay[];
  readonly idleAssetIds: string[];
  readonly dayCount: number;
}

export function utcDay(date: Date): number {
  return Math.floor(date.getTime() / DAY_MS);
}

export function formatDay(day: number): string {
  return new Date(day * DAY_MS).toISOString().slice(0, 10);
}

/** Hours as integer hundredths so sums and differences stay exact. */
export function toCentiHours(hours: number): number {
  return Math.round(hours * 100);
}

/** Per-day centi-hour totals over `[firstDay, firstDay + dayCount)`. */
export function bucketByDay(logs: readonly UsageLog[], firstDay: number, dayCount: number): Int32Array {
  const buckets = new Int32Array(Math.max(0, dayCount));
  for (const log of logs) {
    const index = utcDay(log.loggedAt) - firstDay;
    if (index >= 0 && index < dayCount) {
      buckets[index] += toCentiHours(log.hoursUsed);
    }
  }
  return buckets;
}

/**
 * Rolling utilisation over usage logs.
 *
 * A window of `windowDays` slides across the day series in `stepDays` steps,
 * keeping a running sum over `[lo, hi)`. Only full windows are emitted.
 */
export function aggregateUtilizationTrend(
  request: TrendRequest,
  logs: readonly UsageLog[],
  assets: readonly Asset[] = [],
): UtilizationTrend {
  const width = Math.max(1, Math.floor(request.windowDays));
  const step = Math.max(1, Math.floor(request.stepDays ?? 1));
  const firstDay = utcDay(request.from);
  const dayCount = Math.max(0, utcDay(request.to) - firstDay + 1);

  const scoped = request.assetId ? logs.filter((l) => l.assetId === request.assetId) : logs;
  const buckets = bucketByDay(scoped, firstDay, dayCount);

  const points: TrendPoint[] = [];
  let sum = 0;
  let lo = 0;
  let hi = 0;
  for (let start = 0; start + width <= dayCount; start += step) {
    while (hi < start + width) sum += buckets[hi++];
    while (lo < start) sum -= buckets[lo++];
    points.push({
      windowStart: formatDay(firstDay + start),
      windowEnd: formatDay(firstDay + start + width - 1),
      totalHours: sum / 100,
      averageDailyHours: Math.round(sum / width) / 100,
    });
  }

  const peakDays: PeakDay[] = [...buckets.keys()]
    .filter((i) => buckets[i] > 0)
    .sort((a, b) => buckets[b] - buckets[a] || a - b)
    .slice(0, PEAK_DAY_LIMIT)
    .map((i) => ({ date: formatDay(firstDay + i), totalHours: buckets[i] / 100 }));

  const perAsset = new Map<string, number>();
  for (const log of scoped) {
    const index = utcDay(log.loggedAt) - firstDay;
    if (index < 0 || index >= dayCount) continue;
    perAsset.set(log.assetId, (perAsset.get(log.assetId) ?? 0) + toCentiHours(log.hoursUsed));
  }

  const idleThreshold = toCentiHours(IDLE_DAILY_HOURS) * dayCount;
  const idleAssetIds =
    dayCount === 0
      ? []
      : assets
          .filter((a) => a.status !== 'retired' && (!request.assetId || a.id === request.assetId))
          .filter((a) => (perAsset.get(a.id) ?? 0) < idleThreshold)
          .map((a) => a.id)
          .sort(compareIds);

  return { points, peakDays, idleAssetIds, dayCount };
}
