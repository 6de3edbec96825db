// Gage timestamps are local wall-clock times. They travel as Dates pinned at
// UTC offset zero so formatting never depends on the host's time zone.

const WALL_CLOCK_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?/;

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Parse the wall-clock part of "YYYY-MM-DDTHH:MM[:SS]", ignoring any trailing
 * fraction or UTC offset. Returns null when the text does not start that way.
 */
export function parseWallClock(text: string): Date | null {
  const match = WALL_CLOCK_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, year, month, day, hour, minute, second] = match;
  const date = new Date(Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second ?? '0')
  ));

  // Date.UTC rolls 2023-02-30 over into March; treat that as unparseable
  if (date.getUTCDate() !== Number(day) || date.getUTCMonth() !== Number(month) - 1) {
    return null;
  }
  return date;
}

export function fromStoredFields(date: string, time: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date) || !/^\d{2}:\d{2}:\d{2}$/.test(time)) {
    return null;
  }
  return parseWallClock(`${date}T${time}`);
}

export function formatWallDate(timestamp: Date): string {
  return timestamp.toISOString().slice(0, 10);
}

export function formatWallTime(timestamp: Date): string {
  return timestamp.toISOString().slice(11, 19);
}

/** Wall-clock time of an absolute instant in the given IANA zone. */
export function toWallClock(instant: Date, timeZone: string): Date {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(instant);

  const field = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find(p => p.type === type);
    return part ? Number(part.value) : 0;
  };

  return new Date(Date.UTC(
    field('year'),
    field('month') - 1,
    field('day'),
    field('hour'),
    field('minute'),
    field('second')
  ));
}

/** Shift a local Date (as produced by date-fns parse) onto the wall-clock convention. */
export function localToWallClock(local: Date): Date {
  return new Date(Date.UTC(
    local.getFullYear(),
    local.getMonth(),
    local.getDate(),
    local.getHours(),
    local.getMinutes(),
    local.getSeconds()
  ));
}

export function floorToHour(timestamp: Date): number {
  return Math.floor(timestamp.getTime() / HOUR_MS) * HOUR_MS;
}
