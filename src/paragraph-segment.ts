import type { TextFragment } from "./layout-types.ts";
import { PARAGRAPH_GAP_THRESHOLD } from "./layout-types.ts";

export function sortTopToBottom(fragments: readonly TextFragment[]): TextFragment[] {
  return [...fragments].sort((left, right) => {
    const delta = left.box.top - right.box.top;
    if (delta !== 0) return delta;
    return left.index - right.index;
  });
}

/**
 * Renders one column as text, one fragment per line, with a blank line
 * wherever the gap to the previous fragment exceeds
 * {@link PARAGRAPH_GAP_THRESHOLD}. The top edge of the page counts as the
 * previous bottom for the first fragment.
 */
export function segmentParagraphs(column: readonly TextFragment[]): string {
  const lines: string[] = [];
  let previousBottom = 0;

  for (const fragment of sortTopToBottom(column)) {
    if (isParagraphGap(previousBottom, fragment.box.top)) lines.push("");
    lines.push(fragment.text);
    previousBottom = fragment.box.bottom;
  }

  return lines.join("\n");
}

export function isParagraphGap(previousBottom: number, top: number): boolean {
  return top - previousBottom > PARAGRAPH_GAP_THRESHOLD;
}
