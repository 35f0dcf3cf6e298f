/**
 * Runtime configuration read from environment variables.
 * Parsing happens once at start-up; modules below receive plain values.
 */

import path from "path";
import { z } from "zod";
import { ConfigError } from "./errors";

const DEFAULT_SAIH_BASE_URL = "https://www.chguadalquivir.es/saih/";

const EnvSchema = z.object({
  TELEGRAM_TOKEN: z.string().trim().optional(),
  SAIH_BASE_URL: z.string().trim().url().default(DEFAULT_SAIH_BASE_URL),
  STATION_NAME: z.string().trim().min(1).default("Huelma"),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SCRAPER_HEALTH_FILE: z.string().trim().min(1).optional(),
});

export interface AppConfig {
  telegramToken: string | null;
  saihBaseUrl: string;
  /** Direct link to the daily rainfall PDF */
  dailyPdfUrl: string;
  /** ASP.NET page whose image buttons return the report PDFs */
  informesUrl: string;
  /** Name of the image button that returns the weekly (7-day) PDF */
  weeklyButton: string;
  station: string;
  httpTimeoutMs: number;
  scraperHealthFile: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration (${issues.join("; ")})`, issues);
  }

  const e = parsed.data;
  const base = e.SAIH_BASE_URL.endsWith("/") ? e.SAIH_BASE_URL : `${e.SAIH_BASE_URL}/`;

  return {
    telegramToken: e.TELEGRAM_TOKEN || null,
    saihBaseUrl: base,
    dailyPdfUrl: new URL("tmp/LLuvia_diaria.pdf", base).toString(),
    informesUrl: new URL("Informes.aspx", base).toString(),
    weeklyButton: "ctl00$ContentPlaceHolder1$But_Llu7dpdf",
    station: e.STATION_NAME,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    scraperHealthFile: e.SCRAPER_HEALTH_FILE || path.join(process.cwd(), "output", "scraper-health.json"),
  };
}
