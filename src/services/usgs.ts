import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { GageRecord, Reading, SeriesUpdate } from '@/types/gage';
import { AppConfig } from '@/lib/config';
import {
  ImageNotFoundError,
  InvalidGageConfigError,
  UpstreamFormatChangedError,
} from '@/lib/errors';
import { cookieHeader, requestUpstream } from '@/lib/http';
import { getAttribute, stripTags } from '@/lib/html';
import { parseWallClock, toWallClock } from '@/lib/wallClock';
import { FetchOptions, SourceClient, parseReadingValue, sortReadings } from './sourceClient';

const USGS_PAGE_URL = 'https://waterdata.usgs.gov/nwis/uv';
const USGS_IV_URL = 'https://waterservices.usgs.gov/nwis/iv/';

// USGS marks missing instantaneous values with this
const NO_DATA_VALUE = '-999999';

export const USGS_CODE = {
  cfs: '00060',
  feet: '00065',
} as const;

const PAGE_LABEL = {
  cfs: 'Discharge, cubic feet per second',
  feet: 'Gage height, feet',
} as const;

const GRAPH_ALT = 'Graph of ';

const ivResponseSchema = z.object({
  value: z.object({
    timeSeries: z.array(z.object({
      values: z.array(z.object({
        value: z.array(z.object({
          value: z.string(),
          dateTime: z.string(),
        })),
      })).min(1),
    })).min(1),
  }),
});

type UsgsUnits = keyof typeof USGS_CODE;

function usgsUnits(gage: GageRecord): UsgsUnits {
  if (gage.units === 'cfs' || gage.units === 'feet') return gage.units;
  throw new InvalidGageConfigError(
    `Units for USGS gage must be cfs or feet. Received ${gage.units} for ${gage.gageId}`
  );
}

// Latest value printed beside a graph, e.g. "value: 412 ft3/s P"
export interface ScrapedValue {
  value: string;
  unitLabel: string;
  status: string;
}

/** The three tokens after "value:", or the offline placeholder. */
export function pullValue(text: string): ScrapedValue | null {
  const fields = text.split(/\s+/).filter(field => field.length > 0);
  const index = fields.indexOf('value:');
  if (index === -1) return null;
  if (index + 3 >= fields.length) {
    return { value: 'N/A', unitLabel: 'Gauge appears to be offline', status: '' };
  }
  return { value: fields[index + 1], unitLabel: fields[index + 2], status: fields[index + 3] };
}

export interface GagePageGraph {
  imageUrl: string;
  snapshot: ScrapedValue | null;
}

/**
 * Locate the graph for `label` on a USGS gage page.
 * @returns null when the page has no section for the label
 * @throws ImageNotFoundError when the section exists but its graph image does not
 */
export function parseGagePage(html: string, label: string, gageId: string, pageUrl: string): GagePageGraph | null {
  const anchorPattern = /<a\b[^>]*>([\s\S]*?)<\/a>/gi;
  let anchor: RegExpExecArray | null;
  while ((anchor = anchorPattern.exec(html)) !== null) {
    const openTag = anchor[0].slice(0, anchor[0].indexOf('>') + 1);
    if (getAttribute(openTag, 'name') !== 'gifno-99') continue;
    if (stripTags(anchor[1]) !== label) continue;

    const afterAnchor = html.slice(anchor.index + anchor[0].length);

    // Text node that follows the anchor's parent element
    const parentClose = /<\/[a-z][a-z0-9]*\s*>/i.exec(afterAnchor);
    const trailing = parentClose
      ? afterAnchor.slice(parentClose.index + parentClose[0].length).split('<')[0]
      : '';
    const snapshot = pullValue(stripTags(trailing));

    const img = /<img\b[^>]*>/i.exec(afterAnchor);
    if (!img || getAttribute(img[0], 'alt') !== GRAPH_ALT) {
      throw new ImageNotFoundError(gageId);
    }
    const src = getAttribute(img[0], 'src');
    if (!src) {
      throw new ImageNotFoundError(gageId);
    }

    return { imageUrl: new URL(src, pageUrl).toString(), snapshot };
  }
  return null;
}

/**
 * One reading from the page's scraped value, stamped at the current minute
 * of gage-local time. Null for the offline placeholder or a non-numeric value.
 */
export function snapshotReading(snapshot: ScrapedValue, now: Date, timeZone: string): Reading | null {
  const value = Number(snapshot.value);
  if (snapshot.value.trim() === '' || !Number.isFinite(value)) return null;

  const wall = toWallClock(now, timeZone);
  wall.setUTCSeconds(0, 0);
  return { value, timestamp: wall };
}

export function parseInstantValues(payload: unknown): Reading[] {
  const parsed = ivResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new UpstreamFormatChangedError(
      `Unexpected USGS instantaneous values payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      parsed.error
    );
  }

  const values = parsed.data.value.timeSeries[0].values[0].value;
  const readings = values.map((entry): Reading => {
    const timestamp = parseWallClock(entry.dateTime);
    if (!timestamp) {
      throw new UpstreamFormatChangedError(`Unparseable USGS dateTime "${entry.dateTime}"`);
    }
    const value = entry.value === NO_DATA_VALUE ? 'Error' : parseReadingValue(entry.value);
    return { value, timestamp };
  });
  return sortReadings(readings);
}

export class USGSClient implements SourceClient {
  readonly gageType = 'USGS';
  readonly retryPolicy = 'once';

  constructor(
    private readonly http: AxiosInstance,
    private readonly config: Pick<AppConfig, 'plotDays' | 'timeZone'>,
    private readonly now: () => Date = () => new Date()
  ) {}

  pageUrl(gageId: string): string {
    return `${USGS_PAGE_URL}?site_no=${gageId}`;
  }

  // URL builder at https://waterservices.usgs.gov/rest/IV-Test-Tool.html
  instantValuesUrl(gageId: string, units: UsgsUnits): string {
    return `${USGS_IV_URL}?sites=${gageId}&parameterCd=${USGS_CODE[units]}` +
      `&period=P${this.config.plotDays}D&siteStatus=all&format=json`;
  }

  async fetch(gage: GageRecord, options: FetchOptions = {}): Promise<SeriesUpdate> {
    const units = usgsUnits(gage);
    const label = PAGE_LABEL[units];
    const pageUrl = this.pageUrl(gage.gageId);

    const page = await requestUpstream<string>(this.http, { url: pageUrl, responseType: 'text' });
    if (options.verbose) {
      console.log(`\t[USGS] looking for ${label}`);
    }

    const update: SeriesUpdate = { readings: [] };
    let snapshot: ScrapedValue | null = null;
    const graph = parseGagePage(String(page.data), label, gage.gageId, pageUrl);
    if (graph) {
      const cookie = cookieHeader(page);
      const image = await requestUpstream<ArrayBuffer>(this.http, {
        url: graph.imageUrl,
        responseType: 'arraybuffer',
        headers: cookie ? { Cookie: cookie } : undefined,
      });
      update.image = Buffer.from(image.data);
      if (graph.snapshot) {
        snapshot = graph.snapshot;
        if (options.verbose) {
          const { value, unitLabel, status } = graph.snapshot;
          console.log(`\t[USGS] got: ${value}, ${unitLabel}, ${status} from website`);
        }
      }
    } else {
      console.warn(`[USGS] No "${label}" graph on the page for ${gage.gageId}`);
    }

    const ivUrl = this.instantValuesUrl(gage.gageId, units);
    const response = await requestUpstream<unknown>(this.http, { url: ivUrl, responseType: 'json' });
    update.readings = parseInstantValues(response.data);

    if (update.readings.length === 0 && snapshot) {
      const fallback = snapshotReading(snapshot, this.now(), this.config.timeZone);
      if (fallback) {
        console.warn(`[USGS] No instantaneous values for ${gage.gageId}, using the page value ${snapshot.value}`);
        update.readings = [fallback];
      }
    }

    if (options.verbose) {
      const last = update.readings[update.readings.length - 1];
      console.log(`\t[USGS] Got ${update.readings.length} results from API. Latest value is: ${last ? last.value : 'none'}`);
    }
    return update;
  }
}
