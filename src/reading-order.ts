import { clusterColumns } from "./column-cluster.ts";
import { config } from "./config.ts";
import { LayoutReconstructionError, describeError } from "./errors.ts";
import { classifyFragments } from "./font-size.ts";
import { parseFragments } from "./fragment-parse.ts";
import type {
  ClassifiedFragment,
  FontSizeOptions,
  Page,
  StructureMetadata,
  TextFragment,
} from "./layout-types.ts";
import { COLUMN_SEPARATOR, PAGE_SEPARATOR } from "./layout-types.ts";
import { logger } from "./logger.ts";
import { groupByPage } from "./page-group.ts";
import { segmentParagraphs } from "./paragraph-segment.ts";
import { extractStructureMetadata } from "./structure-metadata.ts";

interface LayoutOutput {
  text: string;
  fragments: TextFragment[];
  /** Aligned 1:1 with `fragments`. */
  classifications: ClassifiedFragment[];
  structure: StructureMetadata;
}

export type LayoutResult =
  | (LayoutOutput & { ok: true })
  | (LayoutOutput & { ok: false; error: LayoutReconstructionError });

export interface ReconstructLayoutDependencies {
  composeReadingOrder: (pages: Page[]) => string;
}

export function composePage(fragments: readonly TextFragment[]): string {
  const columns = clusterColumns(fragments);
  logger.debug({ fragments: fragments.length, columns: columns.length }, "composing page");
  return columns.map((column) => segmentParagraphs(column)).join(COLUMN_SEPARATOR);
}

export function composeReadingOrder(pages: readonly Page[]): string {
  return pages.map((page) => composePage(page.fragments)).join(PAGE_SEPARATOR);
}

export function concatenateInInputOrder(fragments: readonly TextFragment[]): string {
  return [...fragments]
    .sort((left, right) => left.index - right.index)
    .map((fragment) => fragment.text)
    .join("\n");
}

/**
 * Runs the whole reconstruction for one document. Never throws: a failure
 * while ordering columns, paragraphs or pages degrades the text to plain
 * concatenation in input order and is reported through `ok: false`.
 */
export function reconstructLayout(
  records: readonly unknown[],
  options: FontSizeOptions = {},
  dependencies?: ReconstructLayoutDependencies,
): LayoutResult {
  const resolvedDependencies = dependencies ?? createDefaultDependencies();
  const fontSizeOptions: FontSizeOptions = {
    calibrationFactor: options.calibrationFactor ?? config.fontSize.calibrationFactor,
    baseSize: options.baseSize ?? config.fontSize.baseSize,
    maxSize: options.maxSize ?? config.fontSize.maxSize,
  };

  const fragments = parseFragments(records);
  const classifications = classifyFragments(fragments, fontSizeOptions);
  const structure = extractStructureMetadata(fragments);

  if (fragments.length === 0) {
    logger.info({ records: records.length }, "no text fragments to reconstruct");
    return { ok: true, text: "", fragments, classifications, structure };
  }

  try {
    const text = resolvedDependencies.composeReadingOrder(groupByPage(fragments));
    logger.info(
      { pages: structure.totalPages, fragments: fragments.length, characters: text.length },
      "layout reconstruction complete",
    );
    return { ok: true, text, fragments, classifications, structure };
  } catch (cause: unknown) {
    const error = new LayoutReconstructionError(
      `Layout reconstruction failed: ${describeError(cause)}`,
      cause,
    );
    logger.warn({ err: error }, "falling back to simple concatenation");
    const text = concatenateInInputOrder(fragments);
    return { ok: false, text, fragments, classifications, structure, error };
  }
}

function createDefaultDependencies(): ReconstructLayoutDependencies {
  return { composeReadingOrder };
}
