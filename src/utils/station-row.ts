/**
 * Station row locator
 *
 * Finds the table row of one station in normalized report text. PDF extraction
 * sometimes wraps a row over several physical lines, so continuation lines are
 * appended until enough numbers are collected or the next station's row starts.
 */

import type { StationRow, Token } from "../types";
import { toLines } from "./text-normalize";
import { isStationMarkerLine, tokenizeLine } from "./tokenizer";

export interface LocateRowOptions {
  /** Numbers needed before continuation lines stop being appended */
  minValues: number;
  maxContinuationLines?: number;
}

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export function stationNamePattern(station: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(station.trim())}(?![\\p{L}\\p{N}])`, "iu");
}

const countNumbers = (tokens: Token[]) => tokens.filter(t => t.kind === "number").length;

function assembleRow(lines: string[], start: number, station: string, options: LocateRowOptions): StationRow {
  const maxContinuation = options.maxContinuationLines ?? 3;
  const rowLines = [lines[start]];
  let tokens = tokenizeLine(lines[start]);

  for (let j = start + 1; j < lines.length && j <= start + maxContinuation; j++) {
    if (countNumbers(tokens) >= options.minValues) break;
    if (isStationMarkerLine(lines[j])) break;

    rowLines.push(lines[j]);
    tokens = tokens.concat(tokenizeLine(lines[j]));
  }

  // Only the code opening the block is a row marker; P63 would otherwise count as 63
  let strippedCode: string | null = null;
  if (tokens.length > 0 && tokens[0].kind === "code") {
    strippedCode = tokens[0].text;
    tokens = tokens.slice(1);
  }

  return { station, lineIndex: start, lines: rowLines, tokens, strippedCode };
}

/**
 * Returns the first candidate row holding at least `minValues` numbers, the
 * first candidate when none does, or null when the station is not in the text.
 */
export function locateStationRow(text: string, station: string, options: LocateRowOptions): StationRow | null {
  const lines = toLines(text);
  const pattern = stationNamePattern(station);

  let first: StationRow | null = null;

  for (let i = 0; i < lines.length; i++) {
    if (!pattern.test(lines[i])) continue;

    const row = assembleRow(lines, i, station, options);
    if (countNumbers(row.tokens) >= options.minValues) return row;
    if (!first) first = row;
  }

  return first;
}
