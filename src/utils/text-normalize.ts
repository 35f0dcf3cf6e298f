/**
 * Text normalization for PDF-extracted report text
 */

export interface NormalizeOptions {
  /** Longest run of line breaks kept (2 keeps one blank line, 1 drops them all) */
  maxConsecutiveNewlines?: 1 | 2;
}

/** Horizontal whitespace, including the no-break space some PDFs emit */
const HORIZONTAL_WS = /[ \t\f\v\u00a0]+/g;

export function normalizeReportText(raw: string, options: NormalizeOptions = {}): string {
  const maxNewlines = options.maxConsecutiveNewlines ?? 2;

  const text = raw
    .replace(/\r\n?/g, "\n")
    .replace(HORIZONTAL_WS, " ")
    .replace(/ ?\n ?/g, "\n");

  const newlineRun = new RegExp(`\\n{${maxNewlines + 1},}`, "g");
  return text.replace(newlineRun, "\n".repeat(maxNewlines)).trim();
}

/** Split normalized text into trimmed, non-empty lines */
export function toLines(text: string): string[] {
  return text
    .split("\n")
    .map(l => l.trim())
    .filter(Boolean);
}
