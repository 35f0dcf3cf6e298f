/**
 * Numeric tuple extraction from a located station row
 */

import type { StationRow, Token } from "../types";
import { tokenizeLine } from "./tokenizer";

/** Hour now/prev, day now/prev, month now/prev, hydrological year */
export const DAILY_ARITY = 7;
/** Seven daily columns, then 7-day, month and hydrological-year totals */
export const WEEKLY_ARITY = 10;

export type TupleResult =
  | { ok: true; values: number[] }
  | { ok: false; found: number; values: number[] };

/**
 * Takes number tokens left to right. Values are never reordered; a token whose
 * value does not parse to a finite number counts as missing.
 */
export function extractNumericTuple(source: StationRow | string, required: number): TupleResult {
  const tokens: Token[] = typeof source === "string"
    ? source.split("\n").flatMap(tokenizeLine)
    : source.tokens;

  const values: number[] = [];
  for (const token of tokens) {
    if (token.kind !== "number") continue;
    if (token.value === undefined || !Number.isFinite(token.value)) continue;
    values.push(token.value);
  }

  if (values.length < required) {
    return { ok: false, found: values.length, values };
  }
  return { ok: true, values: values.slice(0, required) };
}
