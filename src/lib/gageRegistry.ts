import fs from 'node:fs/promises';
import {
  GAGE_TYPES,
  GAGE_UNITS,
  GageRecord,
  GageType,
  GageUnits,
  LatestReading,
} from '@/types/gage';
import { GageNotFoundError, InvalidGageConfigError, UnknownGageTypeError } from './errors';
import { TimeSeriesStore } from './timeSeriesStore';

export const GAGE_FILE_COLUMNS = ['gage_id', 'type', 'river', 'location', 'region', 'units', 'menu'] as const;

export const ROCK_REPORT_URL = 'https://poudrerockreport.com/';

export function isGageType(value: string): value is GageType {
  return GAGE_TYPES.some(type => type === value);
}

export function isGageUnits(value: string): value is GageUnits {
  return GAGE_UNITS.some(units => units === value);
}

/**
 * A DWR, USGS, WYSEO, rock report or virtual gage, plus the file names and
 * public page that go with it.
 */
export class Gage implements GageRecord {
  readonly gageId: string;
  readonly gageType: GageType;
  readonly river: string;
  readonly location: string;
  readonly region: string;
  readonly units: GageUnits;
  readonly menu: string[];
  private latestReading: Promise<LatestReading> | null = null;

  constructor(
    record: Omit<GageRecord, 'gageType' | 'units'> & { gageType: string; units: string },
    private readonly store?: TimeSeriesStore
  ) {
    if (!isGageType(record.gageType)) {
      throw new UnknownGageTypeError(record.gageType);
    }
    if (!isGageUnits(record.units)) {
      throw new InvalidGageConfigError(
        `units must be one of ${GAGE_UNITS.join(', ')}, was passed ${record.units} for ${record.gageId}`
      );
    }

    this.gageId = record.gageId;
    this.gageType = record.gageType;
    this.river = record.river;
    this.location = record.location;
    this.region = record.region;
    this.units = record.units;
    this.menu = [...record.menu];
  }

  /** Latest stored reading, read on first use. */
  latest(): Promise<LatestReading> {
    if (!this.latestReading) {
      if (!this.store) {
        return Promise.reject(new Error(`Gage ${this.gageId} was built without a store`));
      }
      this.latestReading = this.store.latest(this.gageId);
    }
    return this.latestReading;
  }

  dataFile(): string {
    return `${this.gageId}.cfs`;
  }

  imageFile(): string {
    return `${this.gageId}.png`;
  }

  upstreamImageFile(): string {
    return `${this.gageId}.gif`;
  }

  hasMenu(flag: string): boolean {
    return this.menu.includes(flag);
  }

  pageUrl(): string | null {
    switch (this.gageType) {
      case 'USGS':
        return `https://waterdata.usgs.gov/nwis/uv?site_no=${this.gageId}`;
      case 'DWR':
        return `https://dwr.state.co.us/Tools/Stations/${this.gageId}`;
      case 'WYSEO':
        return `https://seoflow.wyo.gov/Data/DataSet/Summary/Location/${this.gageId}`;
      case 'PRR':
        return ROCK_REPORT_URL;
      case 'VIRTUAL':
        return null;
    }
  }

  toRecord(): GageRecord {
    return {
      gageId: this.gageId,
      gageType: this.gageType,
      river: this.river,
      location: this.location,
      region: this.region,
      units: this.units,
      menu: [...this.menu],
    };
  }

  toString(): string {
    return `${this.gageId},${this.gageType},${this.river},${this.location}`;
  }
}

// Split one CSV line, honoring double-quoted fields ("a, b" and "" escapes)
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quoted) {
      if (char === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  fields.push(current);
  return fields.map(field => field.trim());
}

export interface RawGageRow {
  gageId: string;
  gageType: string;
  river: string;
  location: string;
  region: string;
  units: string;
  menu: string[];
}

/**
 * Parse the gage configuration text. Lines starting with '#' and blank lines
 * are ignored; the first remaining line is the header.
 */
export function parseGageFile(text: string): RawGageRow[] {
  const lines = text
    .split(/\r?\n/)
    .filter(line => line.trim().length > 0 && !line.trimStart().startsWith('#'));

  if (lines.length === 0) return [];

  const header = splitCsvLine(lines[0]);
  const missing = GAGE_FILE_COLUMNS.filter(column => column !== 'menu' && !header.includes(column));
  if (missing.length > 0) {
    throw new InvalidGageConfigError(`Gage file is missing columns: ${missing.join(', ')}`);
  }

  return lines.slice(1).map((line, index) => {
    const fields = splitCsvLine(line);
    const row: Record<string, string> = {};
    header.forEach((column, i) => {
      row[column] = fields[i] ?? '';
    });

    if (!row.gage_id) {
      throw new InvalidGageConfigError(`Gage file row ${index + 1} has no gage_id: "${line}"`);
    }

    return {
      gageId: row.gage_id,
      gageType: row.type,
      river: row.river,
      location: row.location,
      region: row.region,
      units: row.units || 'cfs',
      menu: (row.menu ?? '')
        .split('|')
        .map(flag => flag.trim())
        .filter(flag => flag.length > 0),
    };
  });
}

export class GageRegistry {
  constructor(
    private readonly gageFile: string,
    private readonly store: TimeSeriesStore
  ) {}

  /** Fresh Gage objects, in file order, on every call. */
  async getGages(): Promise<Gage[]> {
    const text = await fs.readFile(this.gageFile, 'utf8');
    return parseGageFile(text).map(row => new Gage(row, this.store));
  }

  async getGage(gageId: string, gageType: string): Promise<Gage> {
    const gages = await this.getGages();
    const gage = gages.find(g => g.gageId === gageId && g.gageType === gageType);
    if (!gage) {
      throw new GageNotFoundError(gageId, gageType);
    }
    return gage;
  }

  async getRegion(region: string): Promise<Gage[]> {
    const gages = await this.getGages();
    return gages.filter(g => g.region === region);
  }
}

/** Group gages by river, keeping the order rivers first appear in. */
export function getRivers(gages: Gage[]): Map<string, Gage[]> {
  const rivers = new Map<string, Gage[]>();
  for (const gage of gages) {
    const list = rivers.get(gage.river);
    if (list) {
      list.push(gage);
    } else {
      rivers.set(gage.river, [gage]);
    }
  }
  return rivers;
}
