import { loadConfig } from '@/lib/config';
import { USAGE, parseArgs, selectGages } from '@/lib/cliArgs';
import { errorMessage } from '@/lib/errors';
import { GageRegistry } from '@/lib/gageRegistry';
import { createHttpClient } from '@/lib/http';
import { cacheDelete, closeRedisClient, generateDashboardKey } from '@/lib/redis';
import { TimeSeriesStore } from '@/lib/timeSeriesStore';
import { REGIONS } from '@/data/regions';
import { BatchRunner } from '@/services/batchRunner';
import { HydrographRenderer } from '@/services/hydrograph';
import { createSourceClients } from '@/services/sources';

async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  if (!args.ok) {
    console.error(args.message);
    console.error(USAGE);
    return 2;
  }

  const config = loadConfig();
  const store = new TimeSeriesStore(config.dataDir);
  const registry = new GageRegistry(config.gageFile, store);
  const gages = selectGages(await registry.getGages(), args.selection);

  if (gages.length === 0) {
    console.error(args.selection.kind === 'id'
      ? `No gage with id ${args.selection.gageId} in ${config.gageFile}`
      : `No gages selected from ${config.gageFile}`);
    return 1;
  }

  const runner = new BatchRunner({
    clients: createSourceClients(createHttpClient(config), store, config),
    store,
    renderer: new HydrographRenderer(),
    config,
    verbose: args.verbose,
  });

  const results = await runner.run(gages);

  if (results.some(result => result.appended > 0)) {
    const keys = [generateDashboardKey(null), ...REGIONS.map(region => generateDashboardKey(region.code))];
    await cacheDelete(keys);
    await closeRedisClient();
  }

  return 0;
}

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[BATCH] Fatal:', errorMessage(error));
    process.exitCode = 1;
  });
