import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  TimeSeriesStore,
  formatRecord,
  formatValue,
  roundHalfEven,
} from '@/lib/timeSeriesStore';
import { makeTempDir, removeTempDir } from './helpers/tempDir';

const at = (hour: number, minute = 0) => new Date(Date.UTC(2023, 4, 1, hour, minute, 0));

describe('value formatting', () => {
  it('rounds halves to the even neighbour', () => {
    expect(roundHalfEven(12.5)).toBe(12);
    expect(roundHalfEven(13.5)).toBe(14);
    expect(roundHalfEven(12.4)).toBe(12);
    expect(roundHalfEven(12.6)).toBe(13);
    expect(roundHalfEven(-2.5)).toBe(-2);
  });

  it('rounds only discharge', () => {
    expect(formatValue(12.6, 'cfs')).toBe('13');
    expect(formatValue(3.45, 'feet')).toBe('3.45');
    expect(formatValue(1234.5, 'ac-ft')).toBe('1234.5');
    expect(formatValue('Error', 'cfs')).toBe('Error');
  });

  it('writes value, date and time', () => {
    expect(formatRecord({ value: 12.5, timestamp: at(7) }, 'cfs')).toBe('12,2023-05-01,07:00:00');
  });
});

describe('TimeSeriesStore', () => {
  let dir: string;
  let store: TimeSeriesStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new TimeSeriesStore(dir);
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('returns what was appended as the latest reading', async () => {
    await store.append({ gageId: 'TEST', units: 'cfs' }, [
      { value: 99, timestamp: at(6, 45) },
      { value: 101.4, timestamp: at(7) },
    ]);

    expect(await fs.readFile(path.join(dir, 'TEST.cfs'), 'utf8'))
      .toBe('99,2023-05-01,06:45:00\n101,2023-05-01,07:00:00\n');
    expect(await store.latest('TEST')).toEqual({ value: 101, date: '2023-05-01', time: '07:00:00' });
  });

  it('keeps Error readings as Error', async () => {
    await store.append({ gageId: 'TEST', units: 'cfs' }, [{ value: 'Error', timestamp: at(7) }]);

    expect(await store.latest('TEST')).toEqual({ value: 'Error', date: '2023-05-01', time: '07:00:00' });
    expect(await store.fullSeries('TEST')).toEqual([{ value: 'Error', timestamp: at(7) }]);
  });

  it('reports an unknown reading for a gage with no file', async () => {
    expect(await store.latest('MISSING')).toEqual({ value: 999999, date: 'N/A', time: 'N/A' });
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('skips a corrupt line and logs it once', async () => {
    await fs.writeFile(path.join(dir, 'TEST.cfs'), [
      '10,2023-05-01,07:00:00',
      '11,2023-05-01,07:15:00',
      'abc,2023-05-01',
      '12,2023-05-01,07:30:00',
      '',
    ].join('\n'));

    const series = await store.fullSeries('TEST');

    expect(series).toEqual([
      { value: 10, timestamp: at(7) },
      { value: 11, timestamp: at(7, 15) },
      { value: 12, timestamp: at(7, 30) },
    ]);
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith(
      `[STORE] Corrupt line found in ${path.join(dir, 'TEST.cfs')}: "abc,2023-05-01"`
    );
  });

  it('returns an empty series for a gage with no file', async () => {
    expect(await store.fullSeries('MISSING')).toEqual([]);
  });

  it('appends only readings newer than the last stored line', async () => {
    const target = { gageId: 'TEST', units: 'feet' as const };
    await store.append(target, [{ value: 3.1, timestamp: at(7) }, { value: 3.2, timestamp: at(7, 15) }]);

    const appended = await store.appendSince(target, [
      { value: 3.1, timestamp: at(7) },
      { value: 3.2, timestamp: at(7, 15) },
      { value: 3.3, timestamp: at(7, 30) },
    ]);

    expect(appended).toBe(1);
    expect(await store.lastLine('TEST')).toBe('3.3,2023-05-01,07:30:00');
    expect(await store.appendSince(target, [{ value: 3.3, timestamp: at(7, 30) }])).toBe(0);
  });

  it('appends a corrected value posted at the last stored time', async () => {
    const target = { gageId: 'TEST', units: 'feet' as const };
    await store.append(target, [{ value: 3.4, timestamp: at(7) }]);

    expect(await store.appendSince(target, [{ value: 3.6, timestamp: at(7) }])).toBe(1);
    expect(await fs.readFile(path.join(dir, 'TEST.cfs'), 'utf8'))
      .toBe('3.4,2023-05-01,07:00:00\n3.6,2023-05-01,07:00:00\n');
  });

  it('dates new readings from the last parseable line when the tail is malformed', async () => {
    await fs.writeFile(path.join(dir, 'TEST.cfs'), '10,2023-05-01,07:00:00\ngarbage\n');

    const appended = await store.appendSince({ gageId: 'TEST', units: 'cfs' }, [
      { value: 10, timestamp: at(7) },
      { value: 12, timestamp: at(7, 15) },
    ]);

    expect(appended).toBe(1);
    expect(await fs.readFile(path.join(dir, 'TEST.cfs'), 'utf8'))
      .toBe('10,2023-05-01,07:00:00\ngarbage\n12,2023-05-01,07:15:00\n');
    expect(console.warn).toHaveBeenCalledWith(
      `[STORE] Skipping malformed line in ${path.join(dir, 'TEST.cfs')}: "garbage"`
    );
  });
});
