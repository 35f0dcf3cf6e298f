/**
 * Rainfall report runner
 *
 * Usage:
 *   tsx src/run-report.ts daily  [--station NAME] [--chat CHAT_ID]
 *   tsx src/run-report.ts weekly [--station NAME] [--chat CHAT_ID]
 *   tsx src/run-report.ts status
 */

import { main } from "./cli";
import { normalizeErrorText } from "./errors";

(async () => {
  try {
    process.exit(await main(process.argv.slice(2)));
  } catch (error) {
    console.error("❌", normalizeErrorText(error));
    process.exit(1);
  }
})();
