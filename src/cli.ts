/**
 * Command line handling for the report runner
 * With --chat the report is also sent through the Telegram bot (TELEGRAM_TOKEN).
 */

import { loadConfig, type AppConfig } from "./config";
import { scrapeRainfallReport } from "./scrapers/saih-rainfall";
import { getScraperHealth } from "./scrapers/scraper-monitor";
import { TelegramClient } from "./telegram/client";
import type { ReportType } from "./types";

export interface RunArgs {
  command: string | undefined;
  station?: string;
  chatId?: string;
}

export function parseArgs(argv: string[]): RunArgs {
  const args: RunArgs = { command: argv[0] };

  for (let i = 1; i < argv.length; i++) {
    const flag = argv[i];
    const value = argv[i + 1];
    if ((flag === "--station" || flag === "--chat") && value !== undefined && !value.startsWith("--")) {
      if (flag === "--station") args.station = value;
      else args.chatId = value;
      i++;
    } else {
      throw new Error(`Unknown or incomplete option: ${flag}`);
    }
  }

  return args;
}

async function runReport(type: ReportType, args: RunArgs, config: AppConfig): Promise<boolean> {
  console.log(`⏳ Fetching ${type} rainfall report for ${args.station ?? config.station}...\n`);

  const outcome = await scrapeRainfallReport(type, { config, station: args.station });
  console.log(outcome.message);

  if (args.chatId) {
    if (!config.telegramToken) {
      console.error("\n❌ TELEGRAM_TOKEN is not set, cannot send the report");
      return false;
    }
    const sent = await new TelegramClient(config.telegramToken).sendMessage(args.chatId, outcome.message);
    if (sent.ok) console.log(`\n📨 Sent to chat ${args.chatId} (message ${sent.messageId})`);
    else return false;
  }

  return outcome.ok;
}

function printStatus(config: AppConfig): void {
  const health = getScraperHealth(config.scraperHealthFile);
  console.log("📊 Scraper health (last 30 days):");

  if (health.length === 0) {
    console.log("   No runs recorded");
    return;
  }

  for (const h of health) {
    console.log(`\n   ${h.station} ${h.type}`);
    console.log(`   Runs: ${h.totalRuns} (${h.successRate}% ok), avg ${h.avgDuration}ms`);
    console.log(`   Last success: ${h.lastSuccess || "Never"}`);
    console.log(`   Last failure: ${h.lastFailure || "Never"}`);
    for (const err of h.recentErrors) console.log(`   - ${err}`);
  }
}

function printUsage(): void {
  console.log("SAIH Rainfall Reporter");
  console.log("\nUsage:");
  console.log("  npm run report:daily  -- [--station NAME] [--chat CHAT_ID]   - Daily rainfall report");
  console.log("  npm run report:weekly -- [--station NAME] [--chat CHAT_ID]   - Last 7 days report");
  console.log("  npm run report:status                                         - Scraper health");
}

export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  const config = loadConfig();

  switch (args.command) {
    case "daily":
    case "weekly":
      return (await runReport(args.command, args, config)) ? 0 : 1;

    case "status":
      printStatus(config);
      return 0;

    default:
      printUsage();
      return args.command === undefined ? 0 : 1;
  }
}
