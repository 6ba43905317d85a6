import type { ClassifiedFragment, FontSizeOptions, TextFragment, TextType } from "./layout-types.ts";
import {
  BODY_TEXT_MAX_SIZE,
  DEFAULT_BASE_FONT_SIZE,
  DEFAULT_CALIBRATION_FACTOR,
  DEFAULT_MAX_FONT_SIZE,
  HEADING_MAX_SIZE,
  MIN_FONT_SIZE_RATIO,
  SMALL_TEXT_MAX_SIZE,
  SUBHEADING_MAX_SIZE,
  TITLE_MAX_SIZE,
  boxHeight,
} from "./layout-types.ts";

export interface TextTypeShare {
  count: number;
  percentage: number;
}

export type TextTypeDistribution = Record<TextType, TextTypeShare>;

/**
 * Converts a normalized box height into a point size, clamped to
 * `[baseSize * 0.7, maxSize]` and rounded to the nearest half point
 * (quarter points go to the even half).
 */
export function estimateFontSize(height: number, options: FontSizeOptions = {}): number {
  const baseSize = options.baseSize ?? DEFAULT_BASE_FONT_SIZE;
  const maxSize = options.maxSize ?? DEFAULT_MAX_FONT_SIZE;
  const calibrationFactor = options.calibrationFactor ?? DEFAULT_CALIBRATION_FACTOR;
  const minSize = baseSize * MIN_FONT_SIZE_RATIO;

  const estimated = height * calibrationFactor;
  const clamped = Number.isNaN(estimated) ? minSize : Math.max(minSize, Math.min(estimated, maxSize));
  return roundHalfToEven(clamped * 2) / 2;
}

// Exact halves go to the even neighbour, so 10.25pt becomes 10pt.
export function roundHalfToEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function classifyTextType(fontSize: number): TextType {
  if (fontSize < SMALL_TEXT_MAX_SIZE) return "small";
  if (fontSize < BODY_TEXT_MAX_SIZE) return "body";
  if (fontSize < HEADING_MAX_SIZE) return "heading";
  if (fontSize < SUBHEADING_MAX_SIZE) return "subheading";
  if (fontSize < TITLE_MAX_SIZE) return "title";
  return "large_title";
}

export function classifyFragment(
  fragment: TextFragment,
  options: FontSizeOptions = {},
): ClassifiedFragment {
  const fontSize = estimateFontSize(boxHeight(fragment.box), options);
  return { fontSize, textType: classifyTextType(fontSize) };
}

export function classifyFragments(
  fragments: readonly TextFragment[],
  options: FontSizeOptions = {},
): ClassifiedFragment[] {
  return fragments.map((fragment) => classifyFragment(fragment, options));
}

export function summarizeTextTypes(classified: readonly ClassifiedFragment[]): TextTypeDistribution {
  const counts = new Map<TextType, number>();
  for (const entry of classified) {
    counts.set(entry.textType, (counts.get(entry.textType) ?? 0) + 1);
  }

  const share = (textType: TextType): TextTypeShare => {
    const count = counts.get(textType) ?? 0;
    return {
      count,
      percentage: classified.length === 0 ? 0 : (count / classified.length) * 100,
    };
  };

  return {
    small: share("small"),
    body: share("body"),
    heading: share("heading"),
    subheading: share("subheading"),
    title: share("title"),
    large_title: share("large_title"),
  };
}
