import fs from 'node:fs/promises';
import path from 'node:path';
import {
  GageUnits,
  LatestReading,
  Reading,
  ReadingValue,
  READING_ERROR,
  SeriesTarget,
} from '@/types/gage';
import { CorruptStoredRecordError } from './errors';
import { formatWallDate, formatWallTime, fromStoredFields } from './wallClock';

export const DATA_FILE_EXTENSION = '.cfs';

// Sorts after any real discharge so an unknown gage never looks "low"
export const UNKNOWN_READING: Readonly<LatestReading> = Object.freeze({
  value: 999999,
  date: 'N/A',
  time: 'N/A',
});

export function isUnknownReading(reading: LatestReading): boolean {
  return reading.date === UNKNOWN_READING.date && reading.time === UNKNOWN_READING.time;
}

/** Round half to even, so 12.5 -> 12 and 13.5 -> 14. */
export function roundHalfEven(value: number): number {
  if (Math.abs(value % 1) === 0.5) {
    return 2 * Math.round(value / 2);
  }
  return Math.round(value);
}

export function formatValue(value: ReadingValue, units: GageUnits): string {
  if (value === READING_ERROR) return READING_ERROR;
  if (units === 'cfs') return String(roundHalfEven(value));
  return String(value);
}

export function formatRecord(reading: Reading, units: GageUnits): string {
  const { value, timestamp } = reading;
  return `${formatValue(value, units)},${formatWallDate(timestamp)},${formatWallTime(timestamp)}`;
}

function parseNumber(text: string): number | null {
  if (text.trim() === '') return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function parseStoredValue(text: string): ReadingValue | null {
  return text === READING_ERROR ? READING_ERROR : parseNumber(text);
}

export class TimeSeriesStore {
  constructor(private readonly dataDir: string) {}

  dataPath(gageId: string): string {
    return path.join(this.dataDir, `${gageId}${DATA_FILE_EXTENSION}`);
  }

  /** Append every reading as given. Callers de-duplicate. */
  async append(target: SeriesTarget, readings: Reading[]): Promise<void> {
    if (readings.length === 0) return;

    await fs.mkdir(this.dataDir, { recursive: true });
    const lines = readings.map(reading => formatRecord(reading, target.units) + '\n').join('');
    await fs.appendFile(this.dataPath(target.gageId), lines, 'utf8');
  }

  /**
   * Append readings newer than the last dated line, plus any reading stamped
   * at that same time whose record differs from it (a corrected value).
   * @returns how many lines were written
   */
  async appendSince(target: SeriesTarget, readings: Reading[]): Promise<number> {
    const last = await this.lastDatedLine(target.gageId);

    const fresh = last
      ? readings.filter(reading => {
          const time = reading.timestamp.getTime();
          if (time > last.timestamp.getTime()) return true;
          return time === last.timestamp.getTime() && formatRecord(reading, target.units) !== last.line;
        })
      : readings;

    await this.append(target, fresh);
    return fresh.length;
  }

  async lastLine(gageId: string): Promise<string | null> {
    const lines = await this.readLines(gageId);
    if (!lines || lines.length === 0) return null;
    return lines[lines.length - 1];
  }

  async latest(gageId: string): Promise<LatestReading> {
    const file = this.dataPath(gageId);
    const lastLine = await this.lastLine(gageId);
    if (lastLine === null) {
      console.warn(`[STORE] No data for ${gageId} in ${file}`);
      return { ...UNKNOWN_READING };
    }

    const fields = lastLine.split(',');
    if (fields.length < 3 || !fromStoredFields(fields[1], fields[2])) {
      console.warn(`[STORE] Malformed last line in ${file}: "${lastLine}"`);
      return { ...UNKNOWN_READING };
    }

    const value = parseNumber(fields[0]);
    return {
      value: value ?? READING_ERROR,
      date: fields[1],
      time: fields[2],
    };
  }

  /**
   * Every stored reading in file order. Corrupt lines are logged and skipped
   * so one bad record never blocks rendering the rest.
   */
  async fullSeries(gageId: string): Promise<Reading[]> {
    const lines = await this.readLines(gageId);
    if (!lines) return [];

    const file = this.dataPath(gageId);
    const series: Reading[] = [];
    for (const line of lines) {
      const fields = line.split(',');
      const value = parseStoredValue(fields[0]);
      const timestamp = fields.length >= 3 ? fromStoredFields(fields[1], fields[2]) : null;

      if (value === null || !timestamp) {
        const corrupt = new CorruptStoredRecordError(file, line);
        console.warn(`[STORE] ${corrupt.message}`);
        continue;
      }
      series.push({ value, timestamp });
    }
    return series;
  }

  private parseTimestamp(line: string): Date | null {
    const fields = line.split(',');
    return fields.length >= 3 ? fromStoredFields(fields[1], fields[2]) : null;
  }

  // Skips a torn or corrupt tail so one bad line never re-appends the window
  private async lastDatedLine(gageId: string): Promise<{ line: string; timestamp: Date } | null> {
    const lines = await this.readLines(gageId);
    if (!lines) return null;

    for (let i = lines.length - 1; i >= 0; i--) {
      const timestamp = this.parseTimestamp(lines[i]);
      if (timestamp) return { line: lines[i], timestamp };
      console.warn(`[STORE] Skipping malformed line in ${this.dataPath(gageId)}: "${lines[i]}"`);
    }
    return null;
  }

  private async readLines(gageId: string): Promise<string[] | null> {
    let text: string;
    try {
      text = await fs.readFile(this.dataPath(gageId), 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    }
    return text
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0);
  }
}
