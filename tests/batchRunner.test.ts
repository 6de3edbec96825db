import fs from 'node:fs/promises';
import path from 'node:path';
import { Mock, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { GageRecord, GageType, Reading, SeriesUpdate } from '@/types/gage';
import {
  ImageNotFoundError,
  UpstreamFormatChangedError,
  UpstreamUnavailableError,
} from '@/lib/errors';
import { TimeSeriesStore } from '@/lib/timeSeriesStore';
import { BatchRunner, Renderer } from '@/services/batchRunner';
import { RockReportClient } from '@/services/rockReport';
import { FetchOptions, RetryPolicy, SourceClient, SourceClients } from '@/services/sourceClient';
import { USGSClient } from '@/services/usgs';
import { fakeHttp, notFound } from './helpers/fakeHttp';
import { rockReportPage, usgsGagePage } from './helpers/pages';
import { makeTempDir, removeTempDir } from './helpers/tempDir';

type FetchMock = Mock<[GageRecord, FetchOptions?], Promise<SeriesUpdate>>;

function gage(gageId: string, gageType: GageType): GageRecord {
  return { gageId, gageType, river: 'Test River', location: 'Test Put-in', region: 'FR', units: 'cfs', menu: [] };
}

function fakeClient(gageType: GageType, retryPolicy: RetryPolicy): SourceClient & { fetch: FetchMock } {
  return {
    gageType,
    retryPolicy,
    fetch: vi.fn<[GageRecord, FetchOptions?], Promise<SeriesUpdate>>()
      .mockRejectedValue(new Error(`unexpected ${gageType} fetch`)),
  };
}

function allClients(overrides: Partial<SourceClients> = {}): SourceClients {
  return {
    USGS: overrides.USGS ?? fakeClient('USGS', 'once'),
    DWR: overrides.DWR ?? fakeClient('DWR', 'never'),
    WYSEO: overrides.WYSEO ?? fakeClient('WYSEO', 'never'),
    PRR: overrides.PRR ?? fakeClient('PRR', 'never'),
    VIRTUAL: overrides.VIRTUAL ?? fakeClient('VIRTUAL', 'never'),
  };
}

const READINGS: Reading[] = [
  { value: 410, timestamp: new Date('2023-05-01T07:00:00Z') },
  { value: 415, timestamp: new Date('2023-05-01T07:15:00Z') },
];

describe('BatchRunner', () => {
  let dir: string;
  let store: TimeSeriesStore;
  let render: Mock<[Reading[], number, string], Promise<boolean>>;
  let renderer: Renderer;
  let sleep: Mock<[number], Promise<void>>;

  const config = () => ({ dataDir: dir, pacingDelayMs: 3000, retryDelayMs: 1000, plotDays: 7 });

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new TimeSeriesStore(dir);
    render = vi.fn<[Reading[], number, string], Promise<boolean>>(async (_series: Reading[], _windowDays: number, outputPath: string) => {
      await fs.writeFile(outputPath, 'png');
      return true;
    });
    renderer = { render };
    sleep = vi.fn<[number], Promise<void>>().mockResolvedValue(undefined);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('stores readings, the upstream image and a rendered graph', async () => {
    const usgs = fakeClient('USGS', 'once');
    usgs.fetch.mockResolvedValueOnce({ readings: READINGS, image: Buffer.from('GIF89a') });
    const runner = new BatchRunner({ clients: allClients({ USGS: usgs }), store, renderer, config: config(), sleep });

    const [result] = await runner.run([gage('06701900', 'USGS')]);

    expect(result).toEqual({
      gageId: '06701900',
      gageType: 'USGS',
      state: 'STORED',
      transitions: ['PENDING', 'FETCHING', 'STORED'],
      attempts: 1,
      appended: 2,
      rendered: true,
    });
    expect(await fs.readFile(path.join(dir, '06701900.gif'), 'utf8')).toBe('GIF89a');
    expect(render).toHaveBeenCalledWith(READINGS, 7, path.join(dir, '06701900.png'));
  });

  it('retries a retryable USGS failure once', async () => {
    const usgs = fakeClient('USGS', 'once');
    usgs.fetch
      .mockRejectedValueOnce(new ImageNotFoundError('06701900'))
      .mockResolvedValueOnce({ readings: READINGS });
    const runner = new BatchRunner({ clients: allClients({ USGS: usgs }), store, renderer, config: config(), sleep });

    const result = await runner.runOne(gage('06701900', 'USGS'));

    expect(result.state).toBe('STORED');
    expect(result.transitions).toEqual(['PENDING', 'FETCHING', 'RETRY', 'FETCHING', 'STORED']);
    expect(result.attempts).toBe(2);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it('skips after the single retry fails', async () => {
    const usgs = fakeClient('USGS', 'once');
    usgs.fetch.mockRejectedValue(new UpstreamUnavailableError('Bad response (503)', 'https://example.test', 503));
    const runner = new BatchRunner({ clients: allClients({ USGS: usgs }), store, renderer, config: config(), sleep });

    const result = await runner.runOne(gage('06701900', 'USGS'));

    expect(result.state).toBe('SKIPPED');
    expect(result.transitions).toEqual(['PENDING', 'FETCHING', 'RETRY', 'FETCHING', 'SKIPPED']);
    expect(result.error).toBe('Bad response (503)');
    expect(usgs.fetch).toHaveBeenCalledTimes(2);
  });

  it('does not retry a format change', async () => {
    const usgs = fakeClient('USGS', 'once');
    usgs.fetch.mockRejectedValue(new UpstreamFormatChangedError('no time series'));
    const runner = new BatchRunner({ clients: allClients({ USGS: usgs }), store, renderer, config: config(), sleep });

    const result = await runner.runOne(gage('06701900', 'USGS'));

    expect(result.transitions).toEqual(['PENDING', 'FETCHING', 'SKIPPED']);
    expect(usgs.fetch).toHaveBeenCalledTimes(1);
  });

  it('never retries other sources', async () => {
    const dwr = fakeClient('DWR', 'never');
    dwr.fetch.mockRejectedValue(new UpstreamUnavailableError('timeout', 'https://example.test'));
    const runner = new BatchRunner({ clients: allClients({ DWR: dwr }), store, renderer, config: config(), sleep });

    const result = await runner.runOne(gage('PLASPLCO', 'DWR'));

    expect(result.transitions).toEqual(['PENDING', 'FETCHING', 'SKIPPED']);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('keeps going after a failed gage and paces between gages', async () => {
    const dwr = fakeClient('DWR', 'never');
    dwr.fetch
      .mockRejectedValueOnce(new UpstreamUnavailableError('timeout', 'https://example.test'))
      .mockResolvedValueOnce({ readings: READINGS });
    const runner = new BatchRunner({ clients: allClients({ DWR: dwr }), store, renderer, config: config(), sleep });

    const results = await runner.run([gage('FIRSTCO', 'DWR'), gage('SECONDCO', 'DWR')]);

    expect(results.map(result => result.state)).toEqual(['SKIPPED', 'STORED']);
    expect(sleep.mock.calls).toEqual([[3000]]);
    expect(console.error).toHaveBeenCalledWith('\t[BATCH] Error getting DWR FIRSTCO: timeout');
  });

  it('skips pacing in verbose mode', async () => {
    const dwr = fakeClient('DWR', 'never');
    dwr.fetch.mockResolvedValue({ readings: READINGS });
    const runner = new BatchRunner({
      clients: allClients({ DWR: dwr }),
      store,
      renderer,
      config: config(),
      sleep,
      verbose: true,
    });

    await runner.run([gage('FIRSTCO', 'DWR'), gage('SECONDCO', 'DWR'), gage('THIRDCO', 'DWR')]);

    expect(sleep).not.toHaveBeenCalled();
    expect(dwr.fetch).toHaveBeenCalledWith(gage('FIRSTCO', 'DWR'), { verbose: true });
  });

  it('leaves the data file and graph alone when the rock report has not changed', async () => {
    const page = rockReportPage('Pine View 3.4 at 0700', 'May 31, 2022 By Test Author');
    const { http } = fakeHttp(() => ({ data: page }));
    const runner = new BatchRunner({
      clients: allClients({ PRR: new RockReportClient(http) }),
      store,
      renderer,
      config: config(),
      sleep,
    });
    const rockReport = { ...gage('PRR', 'PRR'), units: 'feet' as const };
    const dataFile = path.join(dir, 'PRR.cfs');

    const first = await runner.runOne(rockReport);
    const sizeAfterFirst = (await fs.stat(dataFile)).size;
    const second = await runner.runOne(rockReport);

    expect(first).toMatchObject({ state: 'STORED', appended: 1, rendered: true });
    expect(second).toMatchObject({ state: 'STORED', appended: 0, rendered: false });
    expect((await fs.stat(dataFile)).size).toBe(sizeAfterFirst);
    expect(await fs.readFile(dataFile, 'utf8')).toBe('3.4,2022-05-31,07:00:00\n');
    expect(render).toHaveBeenCalledTimes(1);
  });

  it('appends a corrected rock report stage posted under the same time', async () => {
    const pages = [
      rockReportPage('Pine View 3.4 at 0700', 'May 31, 2022 By Test Author'),
      rockReportPage('Pine View 3.6 at 0700', 'May 31, 2022 By Test Author'),
    ];
    let calls = 0;
    const { http } = fakeHttp(() => ({ data: pages[Math.min(calls++, pages.length - 1)] }));
    const runner = new BatchRunner({
      clients: allClients({ PRR: new RockReportClient(http) }),
      store,
      renderer,
      config: config(),
      sleep,
    });
    const rockReport = { ...gage('PRR', 'PRR'), units: 'feet' as const };

    await runner.runOne(rockReport);
    const corrected = await runner.runOne(rockReport);

    expect(corrected).toMatchObject({ state: 'STORED', appended: 1, rendered: true });
    expect(await fs.readFile(path.join(dir, 'PRR.cfs'), 'utf8'))
      .toBe('3.4,2022-05-31,07:00:00\n3.6,2022-05-31,07:00:00\n');
    expect(render).toHaveBeenCalledTimes(2);
  });

  it('stores the scraped USGS page value when the instantaneous values are empty', async () => {
    const { http } = fakeHttp(request => {
      const url = request.url ?? '';
      if (url.startsWith('https://waterdata.usgs.gov/nwis/uv')) return { data: usgsGagePage() };
      if (url.startsWith('https://waterdata.usgs.gov/nwisweb/graph')) return { data: Buffer.from('GIF89a') };
      if (url.startsWith('https://waterservices.usgs.gov/nwis/iv/')) {
        return { data: { value: { timeSeries: [{ values: [{ value: [] }] }] } } };
      }
      return notFound();
    });
    const usgs = new USGSClient(http, { plotDays: 7, timeZone: 'America/Denver' }, () => new Date('2023-05-01T13:20:42Z'));
    const runner = new BatchRunner({ clients: allClients({ USGS: usgs }), store, renderer, config: config(), sleep });

    const result = await runner.runOne(gage('06701900', 'USGS'));

    expect(result).toMatchObject({ state: 'STORED', appended: 1, rendered: true });
    expect(await fs.readFile(path.join(dir, '06701900.cfs'), 'utf8')).toBe('412,2023-05-01,07:20:00\n');
    expect(await fs.readFile(path.join(dir, '06701900.gif'), 'utf8')).toBe('GIF89a');
  });
});
