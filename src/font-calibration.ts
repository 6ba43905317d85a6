import { z } from "zod";
import type { BoxHeightStats } from "./layout-types.ts";
import { config } from "./config.ts";
import { DEFAULT_CALIBRATION_FACTOR } from "./layout-types.ts";
import { logger } from "./logger.ts";

// Only boxes the OCR provider actually supplied count. A missing edge is 0,
// so a box without `bottom` has no positive height and drops out.
const suppliedBoxSchema = z.object({
  grounding: z.object({
    box: z.object({
      top: z.number().finite().catch(0),
      bottom: z.number().finite().catch(0),
    }),
  }),
});

export function collectBoxHeights(records: readonly unknown[]): number[] {
  const heights: number[] = [];
  for (const record of records) {
    const parsed = suppliedBoxSchema.safeParse(record);
    if (!parsed.success) continue;
    const { top, bottom } = parsed.data.grounding.box;
    if (bottom - top > 0) heights.push(bottom - top);
  }
  return heights.sort((left, right) => left - right);
}

export function analyzeBoxHeights(records: readonly unknown[]): BoxHeightStats | undefined {
  const heights = collectBoxHeights(records);

  if (heights.length === 0) {
    logger.warn("no positive bounding box heights to analyze");
    return undefined;
  }

  const count = heights.length;
  const stats: BoxHeightStats = {
    count,
    min: heights[0],
    max: heights[count - 1],
    mean: heights.reduce((sum, height) => sum + height, 0) / count,
    median: computeMedian(heights),
    p25: heights[Math.floor(count / 4)],
    p75: heights[Math.floor((3 * count) / 4)],
    p90: count >= 10 ? heights[Math.floor((9 * count) / 10)] : heights[count - 1],
  };

  logger.info({ count, median: stats.median, min: stats.min, max: stats.max }, "analyzed box heights");
  return stats;
}

/**
 * Calibration factor that maps the 25th-percentile height (taken as body
 * text, since the median can include headings) to `expectedBodySize`.
 */
export function suggestCalibrationFactor(
  records: readonly unknown[],
  expectedBodySize: number = config.fontSize.baseSize,
): number {
  const stats = analyzeBoxHeights(records);
  if (!stats) {
    logger.warn({ fallback: DEFAULT_CALIBRATION_FACTOR }, "cannot suggest a calibration factor");
    return DEFAULT_CALIBRATION_FACTOR;
  }

  const factor = expectedBodySize / stats.p25;
  logger.info({ factor, bodyHeight: stats.p25, expectedBodySize }, "suggested calibration factor");
  return factor;
}

function computeMedian(sorted: readonly number[]): number {
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[middle];
  return (sorted[middle - 1] + sorted[middle]) / 2;
}
