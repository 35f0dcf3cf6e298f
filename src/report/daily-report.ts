/**
 * Daily rainfall report ("Lluvia diaria")
 *
 * The daily table row carries, in this fixed order: hour now, previous hour,
 * day now, previous day, month now, previous month, hydrological year.
 */

import type { DailyReport, Labeled, MonthLabel, ReportTimestamp } from "../types";
import {
  addDays,
  addHours,
  formatDayLabel,
  formatHourLabel,
  formatTimestamp,
  monthLabel,
  previousMonth,
} from "../utils/calendar";
import { DAILY_ARITY } from "../utils/numeric-tuple";

const unavailable = { source: "unavailable" } as const;

/** Labels worked out from the report timestamp rather than printed beside the values */
function estimated<T>(value: T): Labeled<T> {
  return { source: "estimated", value };
}

export function buildDailyReport(values: number[], timestamp: ReportTimestamp | null, station: string): DailyReport {
  if (values.length < DAILY_ARITY) {
    throw new RangeError(`Daily report needs ${DAILY_ARITY} values, got ${values.length}`);
  }

  const [hourNow, hourPrev, dayNow, dayPrev, monthNow, monthPrev, hydroNow] = values;

  let labels: DailyReport["labels"];
  if (timestamp) {
    const prevMonth = previousMonth(timestamp.year, timestamp.month);
    labels = {
      hourNow: estimated(formatHourLabel(timestamp)),
      hourPrevious: estimated(formatHourLabel(addHours(timestamp, -1))),
      dayNow: estimated(formatDayLabel(timestamp)),
      dayPrevious: estimated(formatDayLabel(addDays(timestamp, -1))),
      monthNow: estimated(monthLabel(timestamp.year, timestamp.month)),
      monthPrevious: estimated(monthLabel(prevMonth.year, prevMonth.month)),
    };
  } else {
    labels = {
      hourNow: unavailable,
      hourPrevious: unavailable,
      dayNow: unavailable,
      dayPrevious: unavailable,
      monthNow: unavailable,
      monthPrevious: unavailable,
    };
  }

  return {
    type: "daily",
    station,
    timestamp,
    hour: { now: hourNow, previous: hourPrev },
    day: { now: dayNow, previous: dayPrev },
    month: { now: monthNow, previous: monthPrev },
    hydroYear: { now: hydroNow },
    labels,
  };
}

function labelText(label: Labeled<string>, placeholder: string): string {
  return label.source === "unavailable" ? placeholder : label.value;
}

function monthText(label: Labeled<MonthLabel>, placeholder: string): string {
  return label.source === "unavailable" ? placeholder : label.value.text;
}

export const mm = (v: number) => `${v.toFixed(1)} mm`;

export function formatDailyReport(report: DailyReport): string {
  const { labels } = report;
  const updated = report.timestamp ? formatTimestamp(report.timestamp) : "no detectado";

  return [
    `📄 Lluvia diaria (actualizado: ${updated})`,
    `${report.station}:`,
    `• Día (${labelText(labels.dayNow, "actual")}): ${mm(report.day.now)}`,
    `• Día (${labelText(labels.dayPrevious, "anterior")}): ${mm(report.day.previous)}`,
    `• Hora (${labelText(labels.hourNow, "actual")}): ${mm(report.hour.now)}`,
    `• Hora (${labelText(labels.hourPrevious, "anterior")}): ${mm(report.hour.previous)}`,
    `• Mes (${monthText(labels.monthNow, "actual")}): ${mm(report.month.now)}`,
    `• Mes (${monthText(labels.monthPrevious, "anterior")}): ${mm(report.month.previous)}`,
    `• Año hidrológico (actual): ${mm(report.hydroYear.now)}`,
  ].join("\n");
}
