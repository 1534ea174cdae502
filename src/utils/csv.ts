import { DailyHours, ReportRow } from '../types';

export const EVENT_CSV_HEADER = ['Employee Name', 'Status', 'Date', 'Time'];
export const DAILY_HOURS_CSV_HEADER = ['Employee Name', 'Date', 'Worked Hours', 'Quarter Hours'];

function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
  return value;
}

export function toCsv(rows: string[][]): string {
  return rows.map((row) => row.map(escapeCsvField).join(',') + '\r\n').join('');
}

export function eventsToCsv(rows: ReportRow[]): string {
  return toCsv([EVENT_CSV_HEADER, ...rows.map((r) => [r.employeeName, r.status, r.date, r.time])]);
}

export function dailyHoursToCsv(rows: DailyHours[]): string {
  return toCsv([
    DAILY_HOURS_CSV_HEADER,
    ...rows.map((r) => [r.employeeName, r.date, r.actualHours, r.quarterHours]),
  ]);
}
