import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import { ParseError } from '../errors/AppError.js';

dayjs.extend(utc);

// Upstream sends either whole seconds or fractional seconds, always in UTC.
const TIMESTAMP_PATTERN = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?Z$/;

export interface Timestamp {
  /** Text exactly as received; sent back upstream as the `since` cursor. */
  raw: string;
  /** Canonical form with nine fractional digits. Orders and compares exactly. */
  sortKey: string;
}

export const parseTimestamp = (raw: string): Timestamp => {
  const match = TIMESTAMP_PATTERN.exec(raw);

  if (!match) {
    throw new ParseError(`Timestamp "${raw}" does not match any accepted format`, { value: raw });
  }

  const [, seconds, fraction = ''] = match;
  const parsed = dayjs.utc(`${seconds}Z`);

  // dayjs rolls impossible dates over (2023-02-30 → 2023-03-02); reject them instead.
  if (!parsed.isValid() || parsed.format('YYYY-MM-DDTHH:mm:ss') !== seconds) {
    throw new ParseError(`Timestamp "${raw}" is not a valid calendar time`, { value: raw });
  }

  return {
    raw,
    sortKey: `${seconds}.${fraction.padEnd(9, '0')}Z`,
  };
};

export const compareTimestamps = (a: Timestamp, b: Timestamp): number => {
  if (a.sortKey === b.sortKey) {
    return 0;
  }

  return a.sortKey < b.sortKey ? -1 : 1;
};

export const isSameInstant = (a: Timestamp, b: Timestamp): boolean => a.sortKey === b.sortKey;

/** Formats in the timestamp's own zone (UTC for every accepted form). */
export const formatTimestamp = (timestamp: Timestamp, format: string): string =>
  dayjs.utc(`${timestamp.sortKey.slice(0, 23)}Z`).format(format);

export const toMonthKey = (timestamp: Timestamp): string => formatTimestamp(timestamp, 'YYYY-MM');
