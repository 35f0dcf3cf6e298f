/**
 * Line tokenizer for report tables
 *
 * Lexes one line into station codes, dates, times, numbers and words. A station
 * code (P63, E01) is only recognised as the first token of a line; anywhere
 * else the same characters come out as a word followed by a number.
 */

import type { Token } from "../types";

const DATE = /\d{1,2}\/\d{1,2}(?:\/(?:\d{4}|\d{2}))?(?![\d/])/y;
const TIME = /\d{1,2}:\d{2}(?!\d)/y;
const CODE = /(?:[A-Z]\d{2}|P\d+)(?![\p{L}\p{N}])/uy;
const NUMBER = /[-+]?\d+(?:[.,]\d+)?/y;
const WORD = /(?:[-+](?!\d)|[^\s\d+-])+/y;
const SPACE = /\s+/y;

function matchAt(pattern: RegExp, line: string, pos: number): string | null {
  pattern.lastIndex = pos;
  const m = pattern.exec(line);
  return m ? m[0] : null;
}

/** Parse a numeric token, decimal comma or point */
export function parseDecimal(text: string): number {
  return Number.parseFloat(text.replace(",", "."));
}

export function tokenizeLine(line: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < line.length) {
    const space = matchAt(SPACE, line, pos);
    if (space) {
      pos += space.length;
      continue;
    }

    // A digit glued to a preceding letter never starts a date or time
    const prev = pos > 0 ? line[pos - 1] : " ";
    const atBoundary = /[\s(\[;:]/.test(prev);

    if (tokens.length === 0) {
      const code = matchAt(CODE, line, pos);
      if (code) {
        tokens.push({ kind: "code", text: code });
        pos += code.length;
        continue;
      }
    }

    if (atBoundary) {
      const date = matchAt(DATE, line, pos);
      if (date) {
        tokens.push({ kind: "date", text: date });
        pos += date.length;
        continue;
      }

      const time = matchAt(TIME, line, pos);
      if (time) {
        tokens.push({ kind: "time", text: time });
        pos += time.length;
        continue;
      }
    }

    const num = matchAt(NUMBER, line, pos);
    if (num) {
      tokens.push({ kind: "number", text: num, value: parseDecimal(num) });
      pos += num.length;
      continue;
    }

    const word = matchAt(WORD, line, pos);
    if (word) {
      tokens.push({ kind: "word", text: word });
      pos += word.length;
      continue;
    }

    // unreachable: every character starts a number or a word
    tokens.push({ kind: "word", text: line[pos] });
    pos += 1;
  }

  return tokens;
}

/** True when the line opens with a station code, i.e. starts a new table row */
export function isStationMarkerLine(line: string): boolean {
  const first = tokenizeLine(line.trim())[0];
  return first !== undefined && first.kind === "code";
}
