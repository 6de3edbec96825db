import { AxiosInstance } from 'axios';
import { isValid, parse } from 'date-fns';
import { GageRecord, Reading, SeriesUpdate } from '@/types/gage';
import { UpstreamFormatChangedError } from '@/lib/errors';
import { ROCK_REPORT_URL } from '@/lib/gageRegistry';
import { findElementByClass, firstElementText } from '@/lib/html';
import { requestUpstream } from '@/lib/http';
import { localToWallClock } from '@/lib/wallClock';
import { FetchOptions, SourceClient } from './sourceClient';

// e.g. 'Pine View 3.4 at 0700'
const HEADLINE_PATTERN = /^(.+?)\s+(\S+)\s+at\s+(\d{3,4})\b/;

// e.g. 'May 31, 2022 By Camp Falbo'
const BYLINE_PATTERN = /^([A-Za-z]+\s+\d{1,2})\s*,\s*(\d{4})\b/;

export interface RockReportEntry {
  name: string;
  reading: Reading;
}

/**
 * Pull the latest stage out of the rock report front page. The page is
 * written by hand, so any deviation from the expected headline and byline
 * is an UpstreamFormatChangedError.
 */
export function parseRockReport(html: string): RockReportEntry {
  const header = findElementByClass(html, 'entry-header');
  if (!header) {
    throw new UpstreamFormatChangedError('Rock report page has no entry-header');
  }

  const headline = firstElementText(header.inner, 'a');
  const headlineMatch = headline ? HEADLINE_PATTERN.exec(headline) : null;
  if (!headline || !headlineMatch) {
    throw new UpstreamFormatChangedError(`Unrecognized rock report headline: "${headline ?? ''}"`);
  }

  const [, name, rawStage, rawTime] = headlineMatch;
  // Trend marks ride along with the stage, e.g. '3.4+'
  const stage = Number(rawStage.replace(/[+-]/g, ''));
  if (!Number.isFinite(stage) || rawStage.replace(/[+-]/g, '') === '') {
    throw new UpstreamFormatChangedError(`Unrecognized rock report stage: "${rawStage}"`);
  }

  const byline = firstElementText(header.inner, 'p');
  const bylineMatch = byline ? BYLINE_PATTERN.exec(byline) : null;
  if (!byline || !bylineMatch) {
    throw new UpstreamFormatChangedError(`Unrecognized rock report byline: "${byline ?? ''}"`);
  }

  const [, monthDay, year] = bylineMatch;
  const local = parse(`${monthDay} ${year} ${rawTime.padStart(4, '0')}`, 'MMMM d yyyy HHmm', new Date());
  if (!isValid(local)) {
    throw new UpstreamFormatChangedError(`Unparseable rock report date: "${monthDay}, ${year} ${rawTime}"`);
  }

  return {
    name,
    reading: { value: stage, timestamp: localToWallClock(local) },
  };
}

/** The Poudre Rock Report blog, one hand-entered stage per post. */
export class RockReportClient implements SourceClient {
  readonly gageType = 'PRR';
  readonly retryPolicy = 'never';

  constructor(
    private readonly http: AxiosInstance,
    private readonly url: string = ROCK_REPORT_URL
  ) {}

  async fetch(gage: GageRecord, options: FetchOptions = {}): Promise<SeriesUpdate> {
    const response = await requestUpstream<string>(this.http, { url: this.url, responseType: 'text' });
    const entry = parseRockReport(String(response.data));

    if (options.verbose) {
      console.log(`\t[PRR] ${gage.gageId}: ${entry.name} ${entry.reading.value} at ${entry.reading.timestamp.toISOString()}`);
    }
    return { readings: [entry.reading] };
  }
}
