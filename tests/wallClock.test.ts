import { describe, expect, it } from 'vitest';
import {
  formatWallDate,
  formatWallTime,
  fromStoredFields,
  localToWallClock,
  parseWallClock,
  toWallClock,
} from '@/lib/wallClock';

describe('parseWallClock', () => {
  it('keeps the wall-clock fields and drops the offset', () => {
    expect(parseWallClock('2023-05-01T07:15:00.000-06:00')?.toISOString()).toBe('2023-05-01T07:15:00.000Z');
  });

  it('accepts a space separator without seconds', () => {
    expect(parseWallClock('2023-05-01 07:15')?.toISOString()).toBe('2023-05-01T07:15:00.000Z');
  });

  it('rejects dates that do not exist', () => {
    expect(parseWallClock('2023-02-30T07:00:00')).toBeNull();
    expect(parseWallClock('yesterday')).toBeNull();
  });
});

describe('fromStoredFields', () => {
  it('reads the date and time columns of a data file', () => {
    expect(fromStoredFields('2023-05-01', '08:00:00')?.toISOString()).toBe('2023-05-01T08:00:00.000Z');
  });

  it('refuses anything but YYYY-MM-DD and HH:MM:SS', () => {
    expect(fromStoredFields('05/01/2023', '08:00:00')).toBeNull();
    expect(fromStoredFields('2023-05-01', '8:00')).toBeNull();
  });
});

describe('toWallClock', () => {
  it('applies daylight saving time in summer', () => {
    expect(toWallClock(new Date('2023-07-01T18:00:00Z'), 'America/Denver').toISOString())
      .toBe('2023-07-01T12:00:00.000Z');
  });

  it('applies standard time in winter', () => {
    expect(toWallClock(new Date('2023-01-15T18:00:00Z'), 'America/Denver').toISOString())
      .toBe('2023-01-15T11:00:00.000Z');
  });

  it('reports midnight as hour zero', () => {
    expect(toWallClock(new Date('2023-07-02T06:00:00Z'), 'America/Denver').toISOString())
      .toBe('2023-07-02T00:00:00.000Z');
  });
});

describe('formatting', () => {
  it('splits a timestamp into the stored date and time', () => {
    const timestamp = new Date(Date.UTC(2023, 4, 1, 7, 5, 9));
    expect(formatWallDate(timestamp)).toBe('2023-05-01');
    expect(formatWallTime(timestamp)).toBe('07:05:09');
  });

  it('moves host-local fields onto the UTC convention', () => {
    expect(localToWallClock(new Date(2022, 4, 31, 7, 0, 0)).toISOString()).toBe('2022-05-31T07:00:00.000Z');
  });
});
