import { AxiosInstance } from 'axios';
import { format, subDays } from 'date-fns';
import { z } from 'zod';
import { GageRecord, Reading, SeriesUpdate } from '@/types/gage';
import { AppConfig } from '@/lib/config';
import { UpstreamFormatChangedError } from '@/lib/errors';
import { requestUpstream } from '@/lib/http';
import { parseWallClock } from '@/lib/wallClock';
import { FetchOptions, SourceClient, parseReadingValue, sortReadings } from './sourceClient';

const DWR_TELEMETRY_URL = 'https://dwr.state.co.us/Rest/GET/api/v2/telemetrystations/telemetrytimeseriesraw/';

const dwrResponseSchema = z.object({
  ResultList: z.array(z.object({
    measValue: z.union([z.number(), z.string(), z.null()]),
    measDateTime: z.string(),
  })),
});

export type DwrParameter = 'DISCHRG' | 'STORAGE';

// Reservoir gages report storage in acre-feet; everything else is discharge
export function dwrParameter(gage: Pick<GageRecord, 'units'>): DwrParameter {
  return gage.units === 'ac-ft' ? 'STORAGE' : 'DISCHRG';
}

export function parseDwrResults(payload: unknown): Reading[] {
  const parsed = dwrResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new UpstreamFormatChangedError(
      `Unexpected DWR payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      parsed.error
    );
  }

  return sortReadings(parsed.data.ResultList.map((result): Reading => {
    const timestamp = parseWallClock(result.measDateTime);
    if (!timestamp) {
      throw new UpstreamFormatChangedError(`Unparseable DWR measDateTime "${result.measDateTime}"`);
    }
    return { value: parseReadingValue(result.measValue), timestamp };
  }));
}

/** Colorado Division of Water Resources telemetry stations. */
export class DWRClient implements SourceClient {
  readonly gageType = 'DWR';
  readonly retryPolicy = 'never';

  constructor(
    private readonly http: AxiosInstance,
    private readonly config: Pick<AppConfig, 'plotDays'>,
    private readonly now: () => Date = () => new Date()
  ) {}

  dataUrl(gage: GageRecord): string {
    const params = new URLSearchParams({
      format: 'json',
      abbrev: gage.gageId,
      parameter: dwrParameter(gage),
      startDate: format(subDays(this.now(), this.config.plotDays + 1), 'MM/dd/yyyy'),
    });
    return `${DWR_TELEMETRY_URL}?${params.toString()}`;
  }

  async fetch(gage: GageRecord, options: FetchOptions = {}): Promise<SeriesUpdate> {
    const url = this.dataUrl(gage);
    const response = await requestUpstream<unknown>(this.http, { url, responseType: 'json' });
    const readings = parseDwrResults(response.data);

    if (options.verbose) {
      console.log(`\t[DWR] Got ${readings.length} results for ${gage.gageId}`);
    }
    return { readings };
  }
}
