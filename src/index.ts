export type {
  BoundingBox,
  BoxHeightStats,
  ClassifiedFragment,
  Column,
  FontSizeOptions,
  Page,
  PageStructure,
  StructureMetadata,
  TextFragment,
  TextType,
} from "./layout-types.ts";
export {
  COLUMN_BREAK_MARKER,
  COLUMN_GAP_THRESHOLD,
  PAGE_BREAK_MARKER,
  PARAGRAPH_GAP_THRESHOLD,
  boxCenterX,
  boxCenterY,
  boxHeight,
  boxWidth,
} from "./layout-types.ts";
export type { RawOcrRecord } from "./fragment-parse.ts";
export { parseFragment, parseFragments } from "./fragment-parse.ts";
export { groupByPage } from "./page-group.ts";
export { clusterColumns } from "./column-cluster.ts";
export { segmentParagraphs } from "./paragraph-segment.ts";
export type { LayoutResult, ReconstructLayoutDependencies } from "./reading-order.ts";
export {
  composePage,
  composeReadingOrder,
  concatenateInInputOrder,
  reconstructLayout,
} from "./reading-order.ts";
export type { TextTypeDistribution, TextTypeShare } from "./font-size.ts";
export {
  classifyFragment,
  classifyFragments,
  classifyTextType,
  estimateFontSize,
  roundHalfToEven,
  summarizeTextTypes,
} from "./font-size.ts";
export type { StructureRecord } from "./structure-metadata.ts";
export { extractStructureMetadata, toStructureRecord } from "./structure-metadata.ts";
export { analyzeBoxHeights, collectBoxHeights, suggestCalibrationFactor } from "./font-calibration.ts";
export { extractRecordsFromBuffer, extractRecordsFromPdf } from "./pdf-extract.ts";
export { parseRecordsJson, readRecordsFile } from "./file-access.ts";
export { ConfigError, InputFileError, LayoutReconstructionError } from "./errors.ts";
export type { Config } from "./config.ts";
export { loadConfig } from "./config.ts";
