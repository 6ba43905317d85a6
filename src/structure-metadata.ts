import { clusterColumns } from "./column-cluster.ts";
import type { PageStructure, StructureMetadata, TextFragment } from "./layout-types.ts";
import { logger } from "./logger.ts";
import { groupByPage } from "./page-group.ts";

/** Snake-case form handed to the document serializer. */
export interface StructureRecord {
  total_pages: number;
  total_chunks: number;
  pages: Record<number, { chunks: number; columns: number; has_multi_column: boolean }>;
}

export function extractStructureMetadata(fragments: readonly TextFragment[]): StructureMetadata {
  const pages: Record<number, PageStructure> = {};
  const grouped = groupByPage(fragments);

  for (const page of grouped) {
    const columnCount = clusterColumns(page.fragments).length;
    pages[page.pageNumber] = {
      chunks: page.fragments.length,
      columns: columnCount,
      hasMultiColumn: columnCount > 1,
    };
  }

  logger.info(
    { totalPages: grouped.length, totalChunks: fragments.length },
    "extracted structure metadata",
  );
  return { totalPages: grouped.length, totalChunks: fragments.length, pages };
}

export function toStructureRecord(metadata: StructureMetadata): StructureRecord {
  const pages: StructureRecord["pages"] = {};
  for (const [pageNumber, page] of Object.entries(metadata.pages)) {
    pages[Number(pageNumber)] = {
      chunks: page.chunks,
      columns: page.columns,
      has_multi_column: page.hasMultiColumn,
    };
  }
  return {
    total_pages: metadata.totalPages,
    total_chunks: metadata.totalChunks,
    pages,
  };
}
