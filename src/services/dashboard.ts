import { differenceInDays, differenceInHours } from 'date-fns';
import { GageSummary, LatestReading, RiverSummary } from '@/types/gage';
import { AppConfig } from '@/lib/config';
import { GageRegistry, getRivers } from '@/lib/gageRegistry';
import { CACHE_TTL, cacheGet, cacheSet, generateDashboardKey } from '@/lib/redis';
import { TimeSeriesStore, isUnknownReading } from '@/lib/timeSeriesStore';
import { fromStoredFields, toWallClock } from '@/lib/wallClock';

/**
 * Label for a reading that is too old to trust. Returns null while the reading
 * is fresh, 'N/A' when there is no usable reading at all.
 */
export function describeReadingAge(
  latest: LatestReading,
  now: Date,
  timeZone: string,
  staleAfterHours: number
): string | null {
  if (isUnknownReading(latest)) return 'N/A';

  const stamp = fromStoredFields(latest.date, latest.time);
  if (!stamp) return 'N/A';

  const wallNow = toWallClock(now, timeZone);
  const hours = differenceInHours(wallNow, stamp);
  if (hours < staleAfterHours) return null;
  if (hours < 48) return `data is ${hours} hours old`;
  return `data is ${differenceInDays(wallNow, stamp)} days old`;
}

function isRiverSummaries(value: unknown): value is RiverSummary[] {
  return Array.isArray(value) && value.every(item =>
    typeof item === 'object' &&
    item !== null &&
    'river' in item &&
    typeof item.river === 'string' &&
    'gages' in item &&
    Array.isArray(item.gages)
  );
}

// Rivers with their gage summaries, in gage file order
export async function buildDashboard(
  config: Pick<AppConfig, 'dataDir' | 'gageFile' | 'timeZone' | 'staleAfterHours'>,
  region: string | null,
  now: Date = new Date()
): Promise<RiverSummary[]> {
  const registry = new GageRegistry(config.gageFile, new TimeSeriesStore(config.dataDir));
  const gages = region ? await registry.getRegion(region) : await registry.getGages();

  const rivers: RiverSummary[] = [];
  for (const [river, riverGages] of getRivers(gages)) {
    const summaries: GageSummary[] = [];
    for (const gage of riverGages) {
      const latest = await gage.latest();
      summaries.push({
        ...gage.toRecord(),
        latest,
        ageLabel: describeReadingAge(latest, now, config.timeZone, config.staleAfterHours),
        pageUrl: gage.pageUrl(),
        imageUrl: `/api/hydrograph/${encodeURIComponent(gage.gageId)}`,
      });
    }
    rivers.push({ river, gages: summaries });
  }
  return rivers;
}

export async function getDashboardRivers(
  config: Pick<AppConfig, 'dataDir' | 'gageFile' | 'timeZone' | 'staleAfterHours'>,
  region: string | null = null
): Promise<RiverSummary[]> {
  const cacheKey = generateDashboardKey(region);
  const cached = await cacheGet(cacheKey, isRiverSummaries);
  if (cached) {
    console.log(`[DASHBOARD] Cache hit for ${cacheKey}`);
    return cached;
  }

  const rivers = await buildDashboard(config, region);
  await cacheSet(cacheKey, rivers, CACHE_TTL.DASHBOARD);
  return rivers;
}
