import type { Column, TextFragment } from "./layout-types.ts";
import { COLUMN_GAP_THRESHOLD, boxCenterX } from "./layout-types.ts";
import { logger } from "./logger.ts";

/**
 * Splits one page's fragments into left-to-right columns.
 *
 * Single pass over the fragments ordered by horizontal center: a fragment
 * opens a new column when its center lies more than
 * {@link COLUMN_GAP_THRESHOLD} away from the center of the column's first
 * fragment. Columns are never merged again once split.
 */
export function clusterColumns(fragments: readonly TextFragment[]): Column[] {
  if (fragments.length === 0) return [];

  const sorted = [...fragments].sort(compareByCenterX);
  const columns: Column[] = [];
  let current: Column = [sorted[0]];

  for (const fragment of sorted.slice(1)) {
    const anchorX = boxCenterX(current[0].box);
    const gap = Math.abs(boxCenterX(fragment.box) - anchorX);
    if (gap > COLUMN_GAP_THRESHOLD) {
      logger.trace({ anchorX, gap }, "column break");
      columns.push(current);
      current = [fragment];
    } else {
      current.push(fragment);
    }
  }
  columns.push(current);

  return columns;
}

function compareByCenterX(left: TextFragment, right: TextFragment): number {
  const delta = boxCenterX(left.box) - boxCenterX(right.box);
  if (delta !== 0) return delta;
  return left.index - right.index;
}
