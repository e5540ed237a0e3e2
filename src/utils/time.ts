import { formatInTimeZone } from 'date-fns-tz';

const FILE_TIMESTAMP_FORMAT = "yyyy-MM-dd_HH:mm:ss.SSSxx";

export function secondsToDate(seconds: number): Date {
  return new Date(Math.round(seconds * 1000));
}

/** `2023-11-14_22:13:20.123+0000` for frame time 1700000000.123 in UTC. */
export function formatFileTimestamp(seconds: number, timezone: string): string {
  return formatInTimeZone(secondsToDate(seconds), timezone, FILE_TIMESTAMP_FORMAT);
}
