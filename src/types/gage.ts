export const GAGE_TYPES = ['USGS', 'DWR', 'WYSEO', 'PRR', 'VIRTUAL'] as const;
export type GageType = typeof GAGE_TYPES[number];

export const GAGE_UNITS = ['cfs', 'feet', 'ac-ft'] as const;
export type GageUnits = typeof GAGE_UNITS[number];

export const READING_ERROR = 'Error';
export type ReadingValue = number | typeof READING_ERROR;

export interface GageRecord {
  gageId: string;
  gageType: GageType;
  river: string;
  location: string;
  region: string;
  units: GageUnits;
  menu: string[];
}

// Timestamps are gage-local wall-clock times pinned at UTC offset zero
export interface Reading {
  value: ReadingValue;
  timestamp: Date;
}

export interface NumericReading {
  value: number;
  timestamp: Date;
}

export interface LatestReading {
  value: ReadingValue;
  date: string;
  time: string;
}

export interface SeriesUpdate {
  readings: Reading[];
  image?: Buffer;
}

export type SeriesTarget = Pick<GageRecord, 'gageId' | 'units'>;

export type GageRunState = 'PENDING' | 'FETCHING' | 'RETRY' | 'STORED' | 'SKIPPED';

export interface GageRunResult {
  gageId: string;
  gageType: GageType;
  state: Extract<GageRunState, 'STORED' | 'SKIPPED'>;
  transitions: GageRunState[];
  attempts: number;
  appended: number;
  rendered: boolean;
  error?: string;
}

export interface GageSummary {
  gageId: string;
  gageType: GageType;
  river: string;
  location: string;
  region: string;
  units: GageUnits;
  menu: string[];
  latest: LatestReading;
  ageLabel: string | null;
  pageUrl: string | null;
  imageUrl: string;
}

export interface RiverSummary {
  river: string;
  gages: GageSummary[];
}
