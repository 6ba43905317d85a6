export interface BoundingBox {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

export interface TextFragment {
  readonly text: string;
  readonly page: number;
  readonly box: BoundingBox;
  /** Position of the source record in the raw input list. */
  readonly index: number;
}

export interface Page {
  pageNumber: number;
  fragments: TextFragment[];
}

export type Column = TextFragment[];

export type TextType = "small" | "body" | "heading" | "subheading" | "title" | "large_title";

export interface ClassifiedFragment {
  fontSize: number;
  textType: TextType;
}

export interface FontSizeOptions {
  baseSize?: number;
  maxSize?: number;
  calibrationFactor?: number;
}

export interface PageStructure {
  chunks: number;
  columns: number;
  hasMultiColumn: boolean;
}

export interface StructureMetadata {
  totalPages: number;
  totalChunks: number;
  pages: Record<number, PageStructure>;
}

export interface BoxHeightStats {
  count: number;
  min: number;
  max: number;
  mean: number;
  median: number;
  p25: number;
  p75: number;
  p90: number;
}

export const FULL_PAGE_BOX: BoundingBox = { left: 0, top: 0, right: 1, bottom: 1 };
export const DEFAULT_PAGE = 0;

export const COLUMN_GAP_THRESHOLD = 0.2;
export const PARAGRAPH_GAP_THRESHOLD = 0.05;
export const COLUMN_BREAK_MARKER = "[Column Break]";
export const PAGE_BREAK_MARKER = "--- Page Break ---";
export const COLUMN_SEPARATOR = `\n\n${COLUMN_BREAK_MARKER}\n\n`;
export const PAGE_SEPARATOR = `\n\n${PAGE_BREAK_MARKER}\n\n`;

export const DEFAULT_BASE_FONT_SIZE = 11;
export const DEFAULT_MAX_FONT_SIZE = 48;
export const DEFAULT_CALIBRATION_FACTOR = 400;
export const MIN_FONT_SIZE_RATIO = 0.7;
export const SMALL_TEXT_MAX_SIZE = 10;
export const BODY_TEXT_MAX_SIZE = 13;
export const HEADING_MAX_SIZE = 18;
export const SUBHEADING_MAX_SIZE = 24;
export const TITLE_MAX_SIZE = 36;

export const TEXT_TYPES: readonly TextType[] = [
  "small",
  "body",
  "heading",
  "subheading",
  "title",
  "large_title",
];

export function boxWidth(box: BoundingBox): number {
  return box.right - box.left;
}

export function boxHeight(box: BoundingBox): number {
  return box.bottom - box.top;
}

export function boxCenterX(box: BoundingBox): number {
  return (box.left + box.right) / 2;
}

export function boxCenterY(box: BoundingBox): number {
  return (box.top + box.bottom) / 2;
}
