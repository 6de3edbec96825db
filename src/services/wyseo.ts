import { AxiosInstance } from 'axios';
import { addDays, format, subDays } from 'date-fns';
import { z } from 'zod';
import { GageRecord, Reading, SeriesUpdate } from '@/types/gage';
import { AppConfig } from '@/lib/config';
import { UnsupportedGageError, UpstreamFormatChangedError } from '@/lib/errors';
import { requestUpstream } from '@/lib/http';
import { toWallClock } from '@/lib/wallClock';
import { FetchOptions, SourceClient, parseReadingValue, sortReadings } from './sourceClient';

const WYSEO_GRID_URL = 'https://seoflow.wyo.gov/Data/DatasetGrid';

// North Platte discharge at Northgate. The dataset grid id and the location
// id differ for every other station, so only this one is wired up.
export const SUPPORTED_WYSEO_DATASET = '4578';

const UTC_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

const wyseoResponseSchema = z.object({
  Data: z.array(z.object({
    Value: z.union([z.number(), z.string(), z.null()]),
    TimeStamp: z.string(),
  })),
});

export function parseWyseoData(payload: unknown, timeZone: string): Reading[] {
  const parsed = wyseoResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new UpstreamFormatChangedError(
      `Unexpected WYSEO payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      parsed.error
    );
  }

  return sortReadings(parsed.data.Data.map((result): Reading => {
    if (!UTC_TIMESTAMP.test(result.TimeStamp)) {
      throw new UpstreamFormatChangedError(`Unparseable WYSEO TimeStamp "${result.TimeStamp}"`);
    }
    return {
      value: parseReadingValue(result.Value),
      timestamp: toWallClock(new Date(result.TimeStamp), timeZone),
    };
  }));
}

/** Wyoming State Engineer's Office dataset grid. */
export class WYSEOClient implements SourceClient {
  readonly gageType = 'WYSEO';
  readonly retryPolicy = 'never';

  constructor(
    private readonly http: AxiosInstance,
    private readonly config: Pick<AppConfig, 'plotDays' | 'timeZone'>,
    private readonly now: () => Date = () => new Date()
  ) {}

  async fetch(gage: GageRecord, options: FetchOptions = {}): Promise<SeriesUpdate> {
    if (gage.gageId !== SUPPORTED_WYSEO_DATASET) {
      throw new UnsupportedGageError(
        `WYSEO only supports dataset ${SUPPORTED_WYSEO_DATASET}, was passed ${gage.gageId}`
      );
    }

    const now = this.now();
    const start = format(subDays(now, this.config.plotDays + 1), 'yyyy-MM-dd');
    const end = format(addDays(now, 2), 'yyyy-MM-dd');
    if (options.verbose) {
      console.log(`\t[WYSEO] Getting data for ${gage.gageId} from ${start} to ${end}`);
    }

    const form = new URLSearchParams({ sort: 'TimeStamp-asc', date: start, endDate: end });
    const url = `${WYSEO_GRID_URL}?dataset=${gage.gageId}`;
    const response = await requestUpstream<unknown>(this.http, {
      url,
      method: 'POST',
      data: form.toString(),
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      responseType: 'json',
    });

    const readings = parseWyseoData(response.data, this.config.timeZone);
    if (options.verbose) {
      console.log(`\t[WYSEO] Got ${readings.length} results for ${gage.gageId}`);
    }
    return { readings };
  }
}
