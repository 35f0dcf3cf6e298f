/**
 * Minimal Telegram Bot API client: sending plain text messages
 */

import fetch from "node-fetch";
import { z } from "zod";
import { normalizeErrorText } from "../errors";
import type { HttpFetch } from "../scrapers/saih-base";

const TELEGRAM_API = "https://api.telegram.org";

const SendMessageResponse = z.object({
  ok: z.boolean(),
  result: z.object({ message_id: z.number() }).optional(),
  description: z.string().optional(),
});

export type SendResult = { ok: true; messageId: number } | { ok: false; description: string };

export class TelegramClient {
  constructor(
    private readonly token: string,
    private readonly fetchImpl: HttpFetch = fetch,
  ) {
    if (!token) throw new Error("Telegram bot token is empty");
  }

  /** Never throws: API and network errors come back as ok=false */
  async sendMessage(chatId: string | number, text: string): Promise<SendResult> {
    const url = `${TELEGRAM_API}/bot${this.token}/sendMessage`;

    try {
      const res = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          chat_id: chatId,
          text,
          disable_web_page_preview: true,
        }),
      });

      const parsed = SendMessageResponse.safeParse(await res.json());
      if (!parsed.success) {
        return { ok: false, description: `Unexpected response (HTTP ${res.status})` };
      }

      const body = parsed.data;
      if (!body.ok || !body.result) {
        const description = body.description ?? `HTTP ${res.status}`;
        console.error(`[Telegram] ❌ sendMessage to ${chatId} failed: ${description}`);
        return { ok: false, description };
      }

      return { ok: true, messageId: body.result.message_id };
    } catch (err) {
      const description = normalizeErrorText(err);
      console.error(`[Telegram] ❌ sendMessage to ${chatId} failed: ${description}`);
      return { ok: false, description };
    }
  }
}
