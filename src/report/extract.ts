/**
 * Report extraction: normalized text + station + report type -> labelled report
 * or an explicit failure, each with the message to show the user.
 */

import type {
  DailyReport,
  ExtractionFailure,
  ExtractionResult,
  ReportType,
  WeeklyReport,
} from "../types";
import { DAILY_ARITY, WEEKLY_ARITY, extractNumericTuple } from "../utils/numeric-tuple";
import { locateStationRow } from "../utils/station-row";
import { normalizeReportText, type NormalizeOptions } from "../utils/text-normalize";
import { locateReportTimestamp } from "../utils/timestamp";
import { buildDailyReport, formatDailyReport } from "./daily-report";
import { buildWeeklyReport, formatWeeklyReport, recoverDateColumns } from "./weekly-report";

export interface ExtractOptions extends NormalizeOptions {
  station: string;
  type: ReportType;
  maxContinuationLines?: number;
}

export const REPORT_ARITY: Record<ReportType, number> = {
  daily: DAILY_ARITY,
  weekly: WEEKLY_ARITY,
};

export function describeFailure(failure: ExtractionFailure): string {
  switch (failure.kind) {
    case "station-not-found":
      return `⚠️ No hay datos para la estación ${failure.station} en el informe.`;
    case "insufficient-values": {
      const found = failure.values.map(v => v.toFixed(1)).join(", ");
      return (
        `⚠️ Datos insuficientes para ${failure.station}: se esperaban ${failure.required} valores ` +
        `y se encontraron ${failure.found}` + (found ? ` (${found}).` : ".")
      );
    }
  }
}

function fail(failure: ExtractionFailure): { ok: false; failure: ExtractionFailure; message: string } {
  return { ok: false, failure, message: describeFailure(failure) };
}

export function extractRainfallReport(rawText: string, options: ExtractOptions & { type: "daily" }): ExtractionResult<DailyReport>;
export function extractRainfallReport(rawText: string, options: ExtractOptions & { type: "weekly" }): ExtractionResult<WeeklyReport>;
export function extractRainfallReport(rawText: string, options: ExtractOptions): ExtractionResult;
export function extractRainfallReport(rawText: string, options: ExtractOptions): ExtractionResult {
  const { station, type } = options;
  const required = REPORT_ARITY[type];

  const text = normalizeReportText(rawText, { maxConsecutiveNewlines: options.maxConsecutiveNewlines });
  const timestamp = locateReportTimestamp(text);

  const row = locateStationRow(text, station, {
    minValues: required,
    maxContinuationLines: options.maxContinuationLines,
  });
  if (!row) {
    return fail({ kind: "station-not-found", station });
  }

  const tuple = extractNumericTuple(row, required);
  if (!tuple.ok) {
    return fail({ kind: "insufficient-values", station, found: tuple.found, required, values: tuple.values });
  }

  if (type === "daily") {
    const report = buildDailyReport(tuple.values, timestamp, station);
    return { ok: true, report, message: formatDailyReport(report) };
  }

  const report = buildWeeklyReport(tuple.values, timestamp, station, recoverDateColumns(text, row));
  return { ok: true, report, message: formatWeeklyReport(report) };
}
