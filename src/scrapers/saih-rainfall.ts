// src/scrapers/saih-rainfall.ts
// Rainfall report scraper - downloads the SAIH PDF, extracts the station row, renders the message

import type { AppConfig } from "../config";
import { DocumentFetchError, normalizeErrorText } from "../errors";
import { extractRainfallReport } from "../report/extract";
import type { ExtractionResult, ReportType } from "../types";
import { downloadPdfDirect, downloadPdfFromInformes, type HttpFetch } from "./saih-base";
import { pdfToText } from "./pdf-text";
import { logScraperRun } from "./scraper-monitor";

export type RainfallScraperConfig = Pick<
  AppConfig,
  "dailyPdfUrl" | "informesUrl" | "weeklyButton" | "station" | "httpTimeoutMs" | "scraperHealthFile"
>;

export interface RainfallScraperDeps {
  config: RainfallScraperConfig;
  /** Overrides config.station */
  station?: string;
  fetchImpl?: HttpFetch;
  pdfToText?: (pdf: Buffer) => Promise<string>;
}

export interface ScrapeOutcome {
  ok: boolean;
  message: string;
  result?: ExtractionResult;
}

const REPORT_NAMES: Record<ReportType, string> = {
  daily: "lluvia diaria",
  weekly: "lluvia semanal",
};

function downloadReport(type: ReportType, deps: RainfallScraperDeps): Promise<Buffer> {
  const { config, fetchImpl } = deps;
  const options = { fetchImpl, timeoutMs: config.httpTimeoutMs };

  return type === "daily"
    ? downloadPdfDirect(config.dailyPdfUrl, options)
    : downloadPdfFromInformes(config.informesUrl, config.weeklyButton, options);
}

/**
 * Fetch, convert and parse one report. Never throws: every failure ends up as
 * a user-facing message with ok=false.
 */
export async function scrapeRainfallReport(type: ReportType, deps: RainfallScraperDeps): Promise<ScrapeOutcome> {
  const station = deps.station ?? deps.config.station;
  const toText = deps.pdfToText ?? pdfToText;
  const startTime = Date.now();

  let outcome: ScrapeOutcome;
  try {
    const pdf = await downloadReport(type, deps);
    const text = await toText(pdf);
    const result = extractRainfallReport(text, { station, type });

    if (result.ok && result.report.type === "weekly" && !result.report.totalMatchesDays) {
      console.warn(`[SAIH] ⚠️  ${station}: 7-day total does not match the sum of the daily columns`);
    }
    outcome = { ok: result.ok, message: result.message, result };
  } catch (err) {
    if (err instanceof DocumentFetchError) {
      console.error(`[SAIH] ❌ ${REPORT_NAMES[type]} download failed:`, err.message);
      outcome = { ok: false, message: `⚠️ No se pudo obtener el informe de ${REPORT_NAMES[type]}: ${err.message}` };
    } else {
      console.error(`[SAIH] ❌ Unexpected error in ${REPORT_NAMES[type]}:`, err);
      outcome = { ok: false, message: `❌ Error inesperado al preparar el informe de ${REPORT_NAMES[type]}.` };
    }
  }

  // The outcome is returned even when the health log cannot be written
  try {
    logScraperRun(deps.config.scraperHealthFile, {
      station,
      type,
      success: outcome.ok,
      duration: Date.now() - startTime,
      error: outcome.ok ? undefined : outcome.message,
    });
  } catch (err) {
    console.error(`[Scraper Monitor] Could not record ${REPORT_NAMES[type]} run:`, normalizeErrorText(err));
  }

  return outcome;
}
