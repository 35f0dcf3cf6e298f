/**
 * Calendar arithmetic and label formatting for report timestamps.
 * Works on plain calendar fields through UTC so the host time zone never shifts a date.
 */

import { MONTHS_ES } from "../data/months";
import type { MonthLabel, ReportTimestamp } from "../types";

const pad2 = (n: number) => String(n).padStart(2, "0");

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function isValidTimestamp(ts: ReportTimestamp): boolean {
  return (
    ts.month >= 1 &&
    ts.month <= 12 &&
    ts.day >= 1 &&
    ts.day <= daysInMonth(ts.year, ts.month) &&
    ts.hour >= 0 &&
    ts.hour <= 23 &&
    ts.minute >= 0 &&
    ts.minute <= 59
  );
}

/** Shift by whole days, keeping the clock time */
export function addDays(ts: ReportTimestamp, days: number): ReportTimestamp {
  const d = new Date(Date.UTC(ts.year, ts.month - 1, ts.day + days, ts.hour, ts.minute));
  return fromUtcDate(d);
}

export function addHours(ts: ReportTimestamp, hours: number): ReportTimestamp {
  const d = new Date(Date.UTC(ts.year, ts.month - 1, ts.day, ts.hour + hours, ts.minute));
  return fromUtcDate(d);
}

/** Previous calendar month, January rolls back to December of the year before */
export function previousMonth(year: number, month: number): { year: number; month: number } {
  return month === 1 ? { year: year - 1, month: 12 } : { year, month: month - 1 };
}

function fromUtcDate(d: Date): ReportTimestamp {
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
  };
}

/** "28/12/2025 09:05" */
export function formatTimestamp(ts: ReportTimestamp): string {
  return `${pad2(ts.day)}/${pad2(ts.month)}/${ts.year} ${pad2(ts.hour)}:${pad2(ts.minute)}`;
}

/** "28/12" */
export function formatDayLabel(ts: Pick<ReportTimestamp, "day" | "month">): string {
  return `${pad2(ts.day)}/${pad2(ts.month)}`;
}

/** "9h" */
export function formatHourLabel(ts: Pick<ReportTimestamp, "hour">): string {
  return `${ts.hour}h`;
}

export function monthLabel(year: number, month: number): MonthLabel {
  return {
    year,
    month,
    text: `${pad2(month)}-${MONTHS_ES[month] ?? String(month)}`,
  };
}
