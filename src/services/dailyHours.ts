import { DailyHours, ReportRow } from '../types';

const QUARTER = 15;

function formatMinutes(total: number): string {
  const hours = Math.floor(total / 60);
  const minutes = ((total % 60) + 60) % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}`;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function minutesSinceMidnight(time: string): number {
  const [hours, minutes] = time.split(':').map(Number);
  return hours * 60 + minutes;
}

// Enter opens a span, the next Leave closes it. A dangling Enter counts nothing.
function workedMinutes(dayRows: ReportRow[]): number {
  let total = 0;
  let enteredAt: number | null = null;

  for (const row of [...dayRows].sort((a, b) => compare(a.time, b.time))) {
    const at = minutesSinceMidnight(row.time);
    if (row.status === 'Enter') {
      enteredAt = at;
    } else if (enteredAt !== null) {
      total += at - enteredAt;
      enteredAt = null;
    }
  }
  return total;
}

function groupBy<T>(items: T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) group.push(item);
    else groups.set(k, [item]);
  }
  return groups;
}

/**
 * Worked time per employee and day, plus the same figure rounded to the
 * nearest quarter hour. The rounding error of each day is carried into the
 * next; the employee's last day absorbs the remainder and is not rounded.
 */
export function calculateDailyHours(rows: ReportRow[]): DailyHours[] {
  const result: DailyHours[] = [];

  for (const [employeeName, employeeRows] of groupBy(rows, (r) => r.employeeName)) {
    const days = groupBy(employeeRows, (r) => r.date);
    const dates = [...days.keys()].sort();
    let carry = 0;

    dates.forEach((date, index) => {
      const worked = workedMinutes(days.get(date) ?? []);
      const adjusted = worked + carry;
      let quarter: number;

      if (index === dates.length - 1) {
        quarter = Math.max(0, adjusted);
      } else {
        const remainder = ((adjusted % QUARTER) + QUARTER) % QUARTER;
        const rounded = remainder <= 7 ? adjusted - remainder : adjusted + (QUARTER - remainder);
        quarter = Math.max(0, rounded);
        carry = adjusted - quarter;
      }

      result.push({
        employeeName,
        date,
        actualHours: formatMinutes(worked),
        quarterHours: formatMinutes(quarter),
      });
    });
  }

  return result.sort(
    (a, b) => compare(a.employeeName, b.employeeName) || compare(a.date, b.date),
  );
}
