/**
 * Report timestamp locator
 *
 * Looks for a "DD/MM/YYYY HH:MM" (or "DD/MM/YY H:MM") date-time in the report.
 * An occurrence introduced by an "updated" hint wins over bare matches, which
 * otherwise may come from headers or footers.
 */

import type { ReportTimestamp, Token } from "../types";
import { isValidTimestamp } from "./calendar";
import { toLines } from "./text-normalize";
import { tokenizeLine } from "./tokenizer";

/** Tolerates mangled accents: "Actualización", "ActualizaciÃ³n", "Actualizaci?n" */
const HINT = /^(?:actualizad[oa]|actualizaci\S{0,3}n|updated|fecha)(?![\p{L}\p{N}])/iu;

interface Candidate {
  timestamp: ReportTimestamp;
  fourDigitYear: boolean;
  hinted: boolean;
}

function parseDateTime(date: string, time: string): { ts: ReportTimestamp; fourDigitYear: boolean } | null {
  const [d, m, y] = date.split("/");
  if (y === undefined) return null;

  // "9:55" -> "09:55"
  const [rawHour, minute] = time.split(":");
  const hour = rawHour.padStart(2, "0");

  const ts: ReportTimestamp = {
    year: y.length === 2 ? 2000 + Number(y) : Number(y),
    month: Number(m),
    day: Number(d),
    hour: Number(hour),
    minute: Number(minute),
  };

  return isValidTimestamp(ts) ? { ts, fourDigitYear: y.length === 4 } : null;
}

function isHint(token: Token | undefined): boolean {
  return token !== undefined && token.kind === "word" && HINT.test(token.text);
}

function collectCandidates(text: string): Candidate[] {
  const candidates: Candidate[] = [];
  let previousLineTokens: Token[] = [];

  for (const line of toLines(text)) {
    const tokens = tokenizeLine(line);

    for (let i = 0; i + 1 < tokens.length; i++) {
      if (tokens[i].kind !== "date" || tokens[i + 1].kind !== "time") continue;

      const parsed = parseDateTime(tokens[i].text, tokens[i + 1].text);
      if (!parsed) continue;

      const hinted =
        tokens.slice(0, i).some(isHint) ||
        (i === 0 && isHint(previousLineTokens[previousLineTokens.length - 1]));

      candidates.push({ timestamp: parsed.ts, fourDigitYear: parsed.fourDigitYear, hinted });
    }

    previousLineTokens = tokens;
  }

  return candidates;
}

/** Returns null when the document carries no recognisable date-time */
export function locateReportTimestamp(text: string): ReportTimestamp | null {
  const candidates = collectCandidates(text);

  const found =
    candidates.find(c => c.hinted) ??
    candidates.find(c => c.fourDigitYear) ??
    candidates[0];

  return found ? found.timestamp : null;
}
