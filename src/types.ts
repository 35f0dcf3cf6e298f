// src/types.ts

export type ReportType = "daily" | "weekly";

/** Wall-clock date and time printed on the report. No time zone attached. */
export interface ReportTimestamp {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
}

export type TokenKind = "code" | "date" | "time" | "number" | "word";

export interface Token {
  kind: TokenKind;
  text: string;
  /** Parsed value, only on number tokens */
  value?: number;
}

export interface StationRow {
  station: string;
  /** Index of the candidate line among the non-empty lines */
  lineIndex: number;
  lines: string[];
  tokens: Token[];
  strippedCode: string | null;
}

/**
 * Value tagged with where it came from: read from the document, derived
 * from other data, or not available at all.
 */
export type Labeled<T> =
  | { source: "recovered"; value: T }
  | { source: "estimated"; value: T }
  | { source: "unavailable" };

export type LabelSource = Labeled<unknown>["source"];

export interface MonthLabel {
  year: number;
  month: number;
  text: string; // "12-diciembre"
}

export interface DailyReport {
  type: "daily";
  station: string;
  timestamp: ReportTimestamp | null;
  hour: { now: number; previous: number };
  day: { now: number; previous: number };
  month: { now: number; previous: number };
  hydroYear: { now: number };
  labels: {
    hourNow: Labeled<string>;
    hourPrevious: Labeled<string>;
    dayNow: Labeled<string>;
    dayPrevious: Labeled<string>;
    monthNow: Labeled<MonthLabel>;
    monthPrevious: Labeled<MonthLabel>;
  };
}

export interface WeeklyDay {
  value: number;
  label: Labeled<string>;
  isToday: boolean;
}

export interface WeeklyReport {
  type: "weekly";
  station: string;
  timestamp: ReportTimestamp | null;
  days: WeeklyDay[];
  labelSource: LabelSource;
  totals: {
    lastSevenDays: number;
    month: number;
    hydroYear: number;
  };
  /** False when the 7-day total does not match the sum of the daily columns */
  totalMatchesDays: boolean;
}

export type RainfallReport = DailyReport | WeeklyReport;

export type ExtractionFailure =
  | { kind: "station-not-found"; station: string }
  | {
      kind: "insufficient-values";
      station: string;
      found: number;
      required: number;
      values: number[];
    };

export type ExtractionResult<R extends RainfallReport = RainfallReport> =
  | { ok: true; report: R; message: string }
  | { ok: false; failure: ExtractionFailure; message: string };
