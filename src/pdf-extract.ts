import { readFile } from "node:fs/promises";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { InputFileError, describeError } from "./errors.ts";
import { assertReadableFile } from "./file-access.ts";
import type { RawOcrRecord } from "./fragment-parse.ts";
import { logger } from "./logger.ts";

interface PdfTextItem {
  str: string;
  transform: number[];
  width: number;
}

interface PageViewport {
  width: number;
  height: number;
}

/**
 * Builds OCR-shaped records from the embedded text layer of a PDF, so the
 * layout engine can run on born-digital documents without an OCR pass.
 */
export async function extractRecordsFromPdf(inputPdfPath: string): Promise<RawOcrRecord[]> {
  await assertReadableFile(inputPdfPath);
  const data = new Uint8Array(await readFile(inputPdfPath));
  try {
    return await extractRecordsFromBuffer(data);
  } catch (error: unknown) {
    throw new InputFileError(`Failed to read PDF text layer: ${describeError(error)}`, error);
  }
}

export async function extractRecordsFromBuffer(data: Uint8Array): Promise<RawOcrRecord[]> {
  const pdf = await getDocument({ data, useSystemFonts: true }).promise;
  const records: RawOcrRecord[] = [];

  try {
    for (let i = 0; i < pdf.numPages; i++) {
      const page = await pdf.getPage(i + 1);
      const viewport = page.getViewport({ scale: 1 });
      const textContent = await page.getTextContent();
      const pageRecords = collectPageRecords(textContent.items, i, viewport);
      logger.debug({ page: i, records: pageRecords.length }, "extracted text layer records");
      records.push(...pageRecords);
    }
    return records;
  } finally {
    await pdf.destroy();
  }
}

export function collectPageRecords(
  items: unknown[],
  pageIndex: number,
  viewport: PageViewport,
): RawOcrRecord[] {
  const records: RawOcrRecord[] = [];

  for (const item of items) {
    if (!isPdfTextItem(item)) continue;
    const record = toRawRecord(item, pageIndex, viewport);
    if (record) records.push(record);
  }

  return records;
}

function isPdfTextItem(item: unknown): item is PdfTextItem {
  return (
    typeof item === "object" &&
    item !== null &&
    "str" in item &&
    typeof item.str === "string" &&
    "transform" in item &&
    Array.isArray(item.transform) &&
    "width" in item &&
    typeof item.width === "number"
  );
}

// PDF space has its origin at the bottom-left; boxes are top-left based.
function toRawRecord(
  item: PdfTextItem,
  pageIndex: number,
  viewport: PageViewport,
): RawOcrRecord | undefined {
  const text = normalizePdfText(item.str);
  if (!text || viewport.width <= 0 || viewport.height <= 0) return undefined;

  const x = item.transform[4];
  const y = item.transform[5];
  const fontSize = Math.hypot(item.transform[2], item.transform[3]);

  return {
    text,
    grounding: {
      page: pageIndex,
      box: {
        left: clampUnit(x / viewport.width),
        top: clampUnit(1 - (y + fontSize) / viewport.height),
        right: clampUnit((x + item.width) / viewport.width),
        bottom: clampUnit(1 - y / viewport.height),
      },
    },
  };
}

function normalizePdfText(text: string): string | undefined {
  const normalized = text.replace(/\s+/g, " ").trim();
  return normalized.length > 0 ? normalized : undefined;
}

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
