import { GageRecord, NumericReading, Reading, SeriesUpdate } from '@/types/gage';
import { VirtualRecipe, virtualRecipes } from '@/data/virtualGages';
import { AppConfig } from '@/lib/config';
import { NoDataComputedError, UnsupportedGageError } from '@/lib/errors';
import { TimeSeriesStore } from '@/lib/timeSeriesStore';
import { DAY_MS, HOUR_MS, floorToHour } from '@/lib/wallClock';
import { FetchOptions, SourceClient } from './sourceClient';

// 1 cfs flowing for an hour is 1/12 acre-foot (3600 ft³ / 43560 ft³)
export const INFLOW_UNIT_FACTOR = 12;
export const OUTLIER_FACTOR = 4;
export const DEFAULT_WINDOW_DAYS = 7;

export function numericReadings(series: Reading[]): NumericReading[] {
  const numeric: NumericReading[] = [];
  for (const reading of series) {
    if (typeof reading.value === 'number' && Number.isFinite(reading.value)) {
      numeric.push({ value: reading.value, timestamp: reading.timestamp });
    }
  }
  return numeric;
}

function latestTimestamp(...inputs: Reading[][]): number {
  let latest = -Infinity;
  for (const series of inputs) {
    for (const reading of series) {
      latest = Math.max(latest, reading.timestamp.getTime());
    }
  }
  return latest;
}

/** Keep points strictly newer than `windowDays` before `latest`. */
export function clipToWindow<T extends { timestamp: Date }>(series: T[], windowDays: number, latest: number): T[] {
  const cutoff = latest - windowDays * DAY_MS;
  return series.filter(point => point.timestamp.getTime() > cutoff);
}

export function median(values: number[]): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

/**
 * Drop points above `factor` × median until none remain. The rule holds for
 * any median, so a zero or negative median can empty the series.
 */
export function rejectOutliers(series: NumericReading[], factor: number = OUTLIER_FACTOR): NumericReading[] {
  let kept = series;
  while (kept.length > 0) {
    const threshold = median(kept.map(point => point.value)) * factor;
    const next = kept.filter(point => point.value <= threshold);
    if (next.length === kept.length) return kept;
    kept = next;
  }
  return kept;
}

/** Mean value per clock hour, keyed by the hour's start in ms. */
export function hourlyMeans(series: NumericReading[]): Map<number, number> {
  const sums = new Map<number, { total: number; count: number }>();
  for (const point of series) {
    const hour = floorToHour(point.timestamp);
    const bucket = sums.get(hour) ?? { total: 0, count: 0 };
    bucket.total += point.value;
    bucket.count += 1;
    sums.set(hour, bucket);
  }

  const means = new Map<number, number>();
  for (const [hour, bucket] of sums) {
    means.set(hour, bucket.total / bucket.count);
  }
  return means;
}

/**
 * `a - b` on the timestamps both series share, clipped to the window before
 * the latest input timestamp.
 */
export function difference(
  seriesA: Reading[],
  seriesB: Reading[],
  windowDays: number = DEFAULT_WINDOW_DAYS
): NumericReading[] {
  const valuesB = new Map<number, number>();
  for (const point of numericReadings(seriesB)) {
    valuesB.set(point.timestamp.getTime(), point.value);
  }

  const joined: NumericReading[] = [];
  for (const point of numericReadings(seriesA)) {
    const other = valuesB.get(point.timestamp.getTime());
    if (other === undefined) continue;
    const value = point.value - other;
    if (Number.isFinite(value)) {
      joined.push({ value, timestamp: point.timestamp });
    }
  }

  const clipped = clipToWindow(joined, windowDays, latestTimestamp(seriesA, seriesB));
  if (clipped.length === 0) {
    throw new NoDataComputedError('No data points calculated for difference');
  }
  return clipped.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

/**
 * Reservoir inflow estimate: hour-over-hour change in storage (ac-ft)
 * converted to cfs, plus the flow released downstream.
 */
export function estimatedInflow(
  reservoirLevel: Reading[],
  downstreamFlow: Reading[],
  windowDays: number = DEFAULT_WINDOW_DAYS
): NumericReading[] {
  const storage = hourlyMeans(numericReadings(reservoirLevel));
  const release = hourlyMeans(numericReadings(downstreamFlow));

  const inflow: NumericReading[] = [];
  const hours = [...storage.keys()].sort((a, b) => a - b);
  for (const hour of hours) {
    const current = storage.get(hour);
    const previous = storage.get(hour - HOUR_MS);
    const flow = release.get(hour);
    if (current === undefined || previous === undefined || flow === undefined) continue;

    inflow.push({
      value: (current - previous) * INFLOW_UNIT_FACTOR + flow,
      timestamp: new Date(hour),
    });
  }

  const clipped = clipToWindow(inflow, windowDays, latestTimestamp(reservoirLevel, downstreamFlow));
  const result = rejectOutliers(clipped);
  if (result.length === 0) {
    throw new NoDataComputedError('No data points calculated for inflow');
  }
  return result;
}

/** Computes VIRTUAL gages from already-stored real gages. */
export class VirtualGageClient implements SourceClient {
  readonly gageType = 'VIRTUAL';
  readonly retryPolicy = 'never';

  constructor(
    private readonly store: TimeSeriesStore,
    private readonly config: Pick<AppConfig, 'plotDays'>,
    private readonly recipes: Record<string, VirtualRecipe> = virtualRecipes
  ) {}

  async compute(recipe: VirtualRecipe): Promise<NumericReading[]> {
    switch (recipe.kind) {
      case 'difference': {
        const [a, b] = await Promise.all([
          this.store.fullSeries(recipe.minuend),
          this.store.fullSeries(recipe.subtrahend),
        ]);
        return difference(a, b, this.config.plotDays);
      }
      case 'inflow': {
        const [reservoir, downstream] = await Promise.all([
          this.store.fullSeries(recipe.reservoir),
          this.store.fullSeries(recipe.downstream),
        ]);
        return estimatedInflow(reservoir, downstream, this.config.plotDays);
      }
    }
  }

  async fetch(gage: GageRecord, options: FetchOptions = {}): Promise<SeriesUpdate> {
    const recipe = this.recipes[gage.gageId];
    if (!recipe) {
      throw new UnsupportedGageError(`No recipe for virtual gage ${gage.gageId}`);
    }

    const readings = await this.compute(recipe);
    if (options.verbose) {
      const last = readings[readings.length - 1];
      console.log(`\t[VIRTUAL] ${gage.gageId} (${recipe.kind}): ${readings.length} points, latest ${last.value}`);
    }
    return { readings };
  }
}
