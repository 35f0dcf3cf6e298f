/**
 * Weekly rainfall report ("Lluvia últimos 7 días")
 *
 * Row layout: seven daily columns (today first, then the six previous days)
 * followed by the 7-day, month and hydrological-year totals. A date header
 * listing the columns oldest first has its daily values read in reverse.
 */

import type { Labeled, ReportTimestamp, StationRow, WeeklyDay, WeeklyReport } from "../types";
import { addDays, formatDayLabel, formatTimestamp } from "../utils/calendar";
import { WEEKLY_ARITY } from "../utils/numeric-tuple";
import { toLines } from "../utils/text-normalize";
import { tokenizeLine } from "../utils/tokenizer";
import { mm } from "./daily-report";

export const DAILY_COLUMNS = 7;

/** Largest gap between the 7-day total and the sum of the columns put down to rounding */
const TOTAL_TOLERANCE = 0.05;

/** "25/01/2026" or "25/01" -> "25/01"; null when not a calendar day */
function dateTokenLabel(text: string): string | null {
  const [d, m] = text.split("/").map(Number);
  if (!(m >= 1 && m <= 12 && d >= 1 && d <= 31)) return null;
  return formatDayLabel({ day: d, month: m });
}

/** Date-only tokens of a line; a date followed by a time is a timestamp, not a column */
function dateColumnsOf(line: string): string[] {
  const tokens = tokenizeLine(line);
  const labels: string[] = [];

  tokens.forEach((token, i) => {
    if (token.kind !== "date") return;
    if (tokens[i + 1]?.kind === "time") return;
    const label = dateTokenLabel(token.text);
    if (label) labels.push(label);
  });

  return labels;
}

/**
 * Reads the date column headers from the nearest line above the station row
 * that lists at least seven dates. Returns [] when no such header exists.
 */
export function recoverDateColumns(text: string, row: StationRow): string[] {
  const lines = toLines(text);

  for (let i = Math.min(row.lineIndex, lines.length) - 1; i >= 0; i--) {
    const dates = dateColumnsOf(lines[i]);
    if (dates.length >= DAILY_COLUMNS) return dates.slice(0, DAILY_COLUMNS);
  }
  return [];
}

/** Day after a "DD/MM" label; both a leap and a common year are tried for end of February */
function followingDays(label: string): string[] {
  const [day, month] = label.split("/").map(Number);
  return [2000, 2001].map(year => formatDayLabel(addDays({ year, month, day, hour: 0, minute: 0 }, 1)));
}

const consecutive = (from: string, to: string) => followingDays(from).includes(to);

/**
 * Header columns put newest first, with `reversed` set when the document lists
 * them oldest first. Null unless the columns are seven consecutive days.
 */
function orderColumns(columns: string[]): { dates: string[]; reversed: boolean } | null {
  const dates = columns.slice(0, DAILY_COLUMNS);
  if (dates.length < DAILY_COLUMNS) return null;

  const pairs = dates.slice(1).map((date, i) => [dates[i], date] as const);
  if (pairs.every(([a, b]) => consecutive(b, a))) return { dates, reversed: false };
  if (pairs.every(([a, b]) => consecutive(a, b))) return { dates: [...dates].reverse(), reversed: true };
  return null;
}

function dayLabels(timestamp: ReportTimestamp | null, columns: string[] | null): Labeled<string>[] {
  const indexes = Array.from({ length: DAILY_COLUMNS }, (_, i) => i);

  if (columns) {
    return columns.map((value): Labeled<string> => ({ source: "recovered", value }));
  }
  if (timestamp) {
    return indexes.map((i): Labeled<string> => ({ source: "estimated", value: formatDayLabel(addDays(timestamp, -i)) }));
  }
  return indexes.map((): Labeled<string> => ({ source: "unavailable" }));
}

/** `columnDates` come in document order, as `recoverDateColumns` returns them */
export function buildWeeklyReport(
  values: number[],
  timestamp: ReportTimestamp | null,
  station: string,
  columnDates: string[] = [],
): WeeklyReport {
  if (values.length < WEEKLY_ARITY) {
    throw new RangeError(`Weekly report needs ${WEEKLY_ARITY} values, got ${values.length}`);
  }

  const ordered = orderColumns(columnDates);
  const dailyValues = values.slice(0, DAILY_COLUMNS);
  if (ordered?.reversed) dailyValues.reverse();

  const labels = dayLabels(timestamp, ordered ? ordered.dates : null);
  const today = timestamp ? formatDayLabel(timestamp) : null;

  const days: WeeklyDay[] = labels.map((label, i) => ({
    value: dailyValues[i],
    label,
    isToday: label.source === "recovered" && today !== null ? label.value === today : i === 0,
  }));

  const [lastSevenDays, month, hydroYear] = values.slice(DAILY_COLUMNS, DAILY_COLUMNS + 3);
  const sum = days.reduce((acc, d) => acc + d.value, 0);

  return {
    type: "weekly",
    station,
    timestamp,
    days,
    labelSource: labels[0].source,
    totals: { lastSevenDays, month, hydroYear },
    totalMatchesDays: Math.abs(sum - lastSevenDays) <= TOTAL_TOLERANCE,
  };
}

const SOURCE_NOTE: Record<WeeklyReport["labelSource"], string> = {
  recovered: "fechas del documento",
  estimated: "fechas estimadas",
  unavailable: "sin fechas",
};

function dayLine(day: WeeklyDay, index: number): string {
  const label = day.label.source === "unavailable" ? `Día ${index + 1}` : day.label.value;
  const today = day.isToday ? " (hoy)" : "";
  return `• ${label}${today}: ${mm(day.value)}`;
}

export function formatWeeklyReport(report: WeeklyReport): string {
  const updated = report.timestamp ? formatTimestamp(report.timestamp) : "no detectado";

  return [
    `📄 Lluvia semanal (actualizado: ${updated})`,
    `${report.station} – lluvia diaria (mm, ${SOURCE_NOTE[report.labelSource]}):`,
    ...report.days.map(dayLine),
    "",
    "Acumulados:",
    `• Últimos 7 días: ${mm(report.totals.lastSevenDays)}`,
    `• Mes actual: ${mm(report.totals.month)}`,
    `• Año hidrológico: ${mm(report.totals.hydroYear)}`,
  ].join("\n");
}
