import { GageRecord, GageType, Reading, SeriesUpdate } from '@/types/gage';

export type RetryPolicy = 'once' | 'never';

export interface FetchOptions {
  verbose?: boolean;
}

/** One upstream source: turns a configured gage into a series update. */
export interface SourceClient {
  readonly gageType: GageType;
  readonly retryPolicy: RetryPolicy;
  fetch(gage: GageRecord, options?: FetchOptions): Promise<SeriesUpdate>;
}

// Closed over GageType so adding a source type without a client fails to compile
export type SourceClients = { readonly [T in GageType]: SourceClient };

export function sortReadings(readings: Reading[]): Reading[] {
  return [...readings].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

export function parseReadingValue(raw: unknown): Reading['value'] {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : 'Error';
  }
  if (typeof raw === 'string' && raw.trim() !== '') {
    const value = Number(raw);
    return Number.isFinite(value) ? value : 'Error';
  }
  return 'Error';
}
