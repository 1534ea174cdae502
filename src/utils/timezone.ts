import moment from 'moment-timezone';

export const DATE_FORMAT = 'YYYY-MM-DD';
export const TIMESTAMP_FORMAT = 'YYYY-MM-DDTHH:mm:ss.SSSZ';

export type DateRange = {
  startDate: string;
  endDate: string;
};

export function formatTimestamp(date: Date, timezone: string): string {
  return moment.tz(date, timezone).format(TIMESTAMP_FORMAT);
}

export function localDate(date: Date, timezone: string): string {
  return moment.tz(date, timezone).format(DATE_FORMAT);
}

// Stored timestamps keep the local wall-clock time up front, whatever the offset.
export function timestampDate(timestamp: string): string {
  return timestamp.slice(0, 10);
}

export function timestampTime(timestamp: string): string {
  return timestamp.slice(11, 19);
}

export function isValidDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && moment(value, DATE_FORMAT, true).isValid();
}

/** The whole previous calendar month, relative to today in `timezone`. */
export function previousMonthRange(timezone: string, now: Date = new Date()): DateRange {
  const lastMonth = moment.tz(now, timezone).subtract(1, 'month');
  return {
    startDate: lastMonth.clone().startOf('month').format(DATE_FORMAT),
    endDate: lastMonth.clone().endOf('month').format(DATE_FORMAT),
  };
}
