import { z } from "zod";
import type { TextFragment } from "./layout-types.ts";
import { DEFAULT_PAGE, FULL_PAGE_BOX } from "./layout-types.ts";
import { logger } from "./logger.ts";

/** Shape of one record as delivered by the OCR provider. Every field may be absent. */
export interface RawOcrRecord {
  text?: string;
  grounding?: {
    page?: number;
    box?: {
      left?: number;
      top?: number;
      right?: number;
      bottom?: number;
    };
  };
}

const boxSchema = z
  .object({
    left: z.number().finite().catch(FULL_PAGE_BOX.left),
    top: z.number().finite().catch(FULL_PAGE_BOX.top),
    right: z.number().finite().catch(FULL_PAGE_BOX.right),
    bottom: z.number().finite().catch(FULL_PAGE_BOX.bottom),
  })
  .catch({ ...FULL_PAGE_BOX });

const groundingSchema = z.object({
  page: z.number().int().nonnegative().catch(DEFAULT_PAGE),
  box: boxSchema,
});

const recordSchema = z.object({
  text: z.string().catch(""),
  grounding: groundingSchema.optional().catch(undefined),
});

export function parseFragments(records: readonly unknown[]): TextFragment[] {
  const fragments: TextFragment[] = [];

  records.forEach((record, index) => {
    const fragment = parseFragment(record, index);
    if (fragment) fragments.push(fragment);
  });

  logger.debug(
    { parsed: fragments.length, total: records.length },
    "parsed OCR records into text fragments",
  );
  return fragments;
}

export function parseFragment(record: unknown, index: number): TextFragment | undefined {
  const parsed = recordSchema.safeParse(record);
  if (!parsed.success) {
    logger.debug({ index }, "skipping record that is not an object");
    return undefined;
  }

  const text = parsed.data.text.trim();
  if (text.length === 0) {
    logger.debug({ index }, "skipping empty record");
    return undefined;
  }

  const grounding = parsed.data.grounding;
  if (!grounding) {
    logger.debug({ index }, "record has no grounding data, using full-page defaults");
    return Object.freeze({ text, page: DEFAULT_PAGE, box: Object.freeze({ ...FULL_PAGE_BOX }), index });
  }

  return Object.freeze({
    text,
    page: grounding.page,
    box: Object.freeze(grounding.box),
    index,
  });
}
