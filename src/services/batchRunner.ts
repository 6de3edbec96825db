import fs from 'node:fs/promises';
import path from 'node:path';
import {
  GageRecord,
  GageRunResult,
  GageRunState,
  Reading,
  SeriesUpdate,
} from '@/types/gage';
import { AppConfig } from '@/lib/config';
import { ImageNotFoundError, UpstreamUnavailableError, errorMessage } from '@/lib/errors';
import { TimeSeriesStore } from '@/lib/timeSeriesStore';
import { SourceClient, SourceClients } from './sourceClient';

export interface Renderer {
  render(series: Reading[], windowDays: number, outputPath: string): Promise<boolean>;
}

export interface BatchRunnerOptions {
  clients: SourceClients;
  store: TimeSeriesStore;
  renderer: Renderer;
  config: Pick<AppConfig, 'dataDir' | 'pacingDelayMs' | 'retryDelayMs' | 'plotDays'>;
  verbose?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function isRetryable(error: unknown): boolean {
  return error instanceof ImageNotFoundError || error instanceof UpstreamUnavailableError;
}

async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * Walks a pre-filtered gage list one gage at a time. A failing gage is
 * logged and skipped; the batch always runs to the end.
 */
export class BatchRunner {
  private readonly verbose: boolean;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: BatchRunnerOptions) {
    this.verbose = options.verbose ?? false;
    this.sleep = options.sleep ?? sleep;
  }

  async run(gages: GageRecord[]): Promise<GageRunResult[]> {
    const results: GageRunResult[] = [];

    for (const [index, gage] of gages.entries()) {
      // Interactive runs skip the politeness delay
      if (index > 0 && !this.verbose) {
        await this.sleep(this.options.config.pacingDelayMs);
      }
      if (this.verbose) {
        console.log(`*** working on ${gage.gageType} gage: ${gage.gageId},${gage.river},${gage.location}`);
      }

      const result = await this.runOne(gage);
      results.push(result);

      if (result.state === 'SKIPPED') {
        console.error(`\t[BATCH] Error getting ${gage.gageType} ${gage.gageId}: ${result.error ?? 'unknown error'}`);
      } else if (this.verbose) {
        console.log(`\tsuccess (${result.appended} new readings${result.rendered ? ', graph updated' : ''})`);
      }
    }

    const stored = results.filter(result => result.state === 'STORED').length;
    console.log(`[BATCH] ${stored}/${results.length} gages stored, ${results.length - stored} skipped`);
    return results;
  }

  async runOne(gage: GageRecord): Promise<GageRunResult> {
    const client: SourceClient = this.options.clients[gage.gageType];
    const transitions: GageRunState[] = ['PENDING'];
    let attempts = 0;
    let update: SeriesUpdate | null = null;

    const skipped = (error: unknown): GageRunResult => {
      transitions.push('SKIPPED');
      return {
        gageId: gage.gageId,
        gageType: gage.gageType,
        state: 'SKIPPED',
        transitions,
        attempts,
        appended: 0,
        rendered: false,
        error: errorMessage(error),
      };
    };

    while (update === null) {
      transitions.push('FETCHING');
      attempts++;
      try {
        update = await client.fetch(gage, { verbose: this.verbose });
      } catch (error) {
        const canRetry = client.retryPolicy === 'once' && attempts === 1 && isRetryable(error);
        if (!canRetry) {
          return skipped(error);
        }
        transitions.push('RETRY');
        if (this.verbose) {
          console.log(`\t${errorMessage(error)}, trying again...`);
        }
        await this.sleep(this.options.config.retryDelayMs);
      }
    }

    try {
      const { appended, rendered } = await this.persist(gage, update);
      transitions.push('STORED');
      return {
        gageId: gage.gageId,
        gageType: gage.gageType,
        state: 'STORED',
        transitions,
        attempts,
        appended,
        rendered,
      };
    } catch (error) {
      return skipped(error);
    }
  }

  private async persist(gage: GageRecord, update: SeriesUpdate): Promise<{ appended: number; rendered: boolean }> {
    const { store, renderer, config } = this.options;

    const appended = await store.appendSince(gage, update.readings);
    if (appended === 0 && this.verbose) {
      console.log(`\tData received is same as in data file: ${(await store.lastLine(gage.gageId)) ?? ''}`);
    }

    if (update.image) {
      await fs.mkdir(config.dataDir, { recursive: true });
      await fs.writeFile(path.join(config.dataDir, `${gage.gageId}.gif`), update.image);
    }

    const imagePath = path.join(config.dataDir, `${gage.gageId}.png`);
    let rendered = false;
    if (appended > 0 || !(await fileExists(imagePath))) {
      const series = await store.fullSeries(gage.gageId);
      rendered = await renderer.render(series, config.plotDays, imagePath);
    }
    return { appended, rendered };
  }
}
