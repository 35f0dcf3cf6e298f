/**
 * PDF to text with pdfjs-dist (legacy build, server-side)
 * Text items are grouped into lines by Y coordinate so table rows read left to right.
 */

import { normalizeErrorText } from "../errors";

export interface PDFTextItem {
  str: string;
  x: number;
  y: number;
}

/**
 * Group text items into lines. Items within `tolerance` of an existing line's
 * Y join that line; lines come out top to bottom, items left to right.
 */
export function groupByLines(items: PDFTextItem[], tolerance: number = 2): string[] {
  const lines = new Map<number, PDFTextItem[]>();

  for (const item of items) {
    if (!item.str.trim()) continue;

    let foundLine = false;
    for (const [y, lineItems] of lines.entries()) {
      if (Math.abs(y - item.y) <= tolerance) {
        lineItems.push(item);
        foundLine = true;
        break;
      }
    }

    if (!foundLine) {
      lines.set(item.y, [item]);
    }
  }

  return Array.from(lines.entries())
    .sort((a, b) => b[0] - a[0]) // PDF Y grows upwards
    .map(([, lineItems]) =>
      lineItems
        .sort((a, b) => a.x - b.x)
        .map(item => item.str.trim())
        .join(" ")
    );
}

/** Extract the text of every page; a page that fails to extract contributes an empty string */
export async function pdfToText(pdfBytes: Buffer | Uint8Array): Promise<string> {
  const pdfjsLib = await import("pdfjs-dist/legacy/build/pdf.mjs");

  // pdfjs refuses Node Buffers
  const data = new Uint8Array(pdfBytes);
  const pdf = await pdfjsLib.getDocument({ data, isEvalSupported: false }).promise;

  const pages: string[] = [];
  try {
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      try {
        const page = await pdf.getPage(pageNum);
        const textContent = await page.getTextContent();

        const items: PDFTextItem[] = [];
        for (const item of textContent.items) {
          if ("str" in item) {
            items.push({ str: item.str, x: Number(item.transform[4]), y: Number(item.transform[5]) });
          }
        }
        pages.push(groupByLines(items).join("\n"));
      } catch (err) {
        console.warn(`[PDF] ⚠️  Page ${pageNum} text extraction failed: ${normalizeErrorText(err)}`);
        pages.push("");
      }
    }
  } finally {
    await pdf.destroy();
  }

  return pages.join("\n");
}
