/**
 * Scraper Health Monitoring Module
 * Tracks report scrape success/failure, durations and error patterns in a JSON log
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import type { ReportType } from "../types";

const MAX_RUNS = 1000;

export interface ScraperRun {
  timestamp: string;
  station: string;
  type: ReportType;
  success: boolean;
  duration: number; // milliseconds
  error?: string;
}

export interface ScraperHealth {
  station: string;
  type: ReportType;
  totalRuns: number;
  successCount: number;
  failureCount: number;
  successRate: number;
  avgDuration: number;
  lastSuccess?: string;
  lastFailure?: string;
  recentErrors: string[];
}

const RunLogSchema = z.array(
  z.object({
    timestamp: z.string(),
    station: z.string(),
    type: z.enum(["daily", "weekly"]),
    success: z.boolean(),
    duration: z.number(),
    error: z.string().optional(),
  })
);

/** Runs recorded in the log file; an unreadable log counts as empty */
export function readScraperRuns(logFile: string): ScraperRun[] {
  if (!fs.existsSync(logFile)) return [];

  try {
    const parsed = RunLogSchema.safeParse(JSON.parse(fs.readFileSync(logFile, "utf-8")));
    if (!parsed.success) {
      console.error(`[Scraper Monitor] Ignoring malformed log file ${logFile}`);
      return [];
    }
    return parsed.data;
  } catch (err) {
    console.error("[Scraper Monitor] Error reading log file:", err);
    return [];
  }
}

/**
 * Log a scraper execution
 */
export function logScraperRun(logFile: string, run: Omit<ScraperRun, "timestamp">, now: Date = new Date()): void {
  const logs = readScraperRuns(logFile);
  logs.push({ ...run, timestamp: now.toISOString() });

  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  fs.writeFileSync(logFile, JSON.stringify(logs.slice(-MAX_RUNS), null, 2));

  const status = run.success ? "✓" : "✗";
  console.log(`[Scraper Monitor] ${status} ${run.station} ${run.type} - ${run.duration}ms`);
}

/**
 * Health metrics per station and report type over the last `days` days
 */
export function getScraperHealth(logFile: string, days = 30, now: Date = new Date()): ScraperHealth[] {
  const since = new Date(now);
  since.setDate(since.getDate() - days);

  const recentLogs = readScraperRuns(logFile).filter(log => new Date(log.timestamp) >= since);

  const grouped = new Map<string, ScraperRun[]>();
  for (const log of recentLogs) {
    const key = `${log.station}:${log.type}`;
    const runs = grouped.get(key) ?? [];
    runs.push(log);
    grouped.set(key, runs);
  }

  const healthMetrics: ScraperHealth[] = [];
  for (const runs of grouped.values()) {
    const { station, type } = runs[0];
    const successRuns = runs.filter(r => r.success);
    const failureRuns = runs.filter(r => !r.success);
    const totalDuration = runs.reduce((sum, r) => sum + r.duration, 0);

    const recentErrors = failureRuns
      .slice(-5) // Last 5 errors
      .map(r => r.error || "Unknown error")
      .filter((err, idx, arr) => arr.indexOf(err) === idx);

    healthMetrics.push({
      station,
      type,
      totalRuns: runs.length,
      successCount: successRuns.length,
      failureCount: failureRuns.length,
      successRate: parseFloat(((successRuns.length / runs.length) * 100).toFixed(2)),
      avgDuration: Math.round(totalDuration / runs.length),
      lastSuccess: successRuns.at(-1)?.timestamp,
      lastFailure: failureRuns.at(-1)?.timestamp,
      recentErrors,
    });
  }

  return healthMetrics.sort((a, b) => a.station.localeCompare(b.station) || a.type.localeCompare(b.type));
}
