import type { Page, TextFragment } from "./layout-types.ts";

export function groupByPage(fragments: readonly TextFragment[]): Page[] {
  const pages = new Map<number, TextFragment[]>();
  for (const fragment of fragments) {
    const existing = pages.get(fragment.page);
    if (existing) {
      existing.push(fragment);
    } else {
      pages.set(fragment.page, [fragment]);
    }
  }

  return [...pages.entries()]
    .sort(([left], [right]) => left - right)
    .map(([pageNumber, pageFragments]) => ({ pageNumber, fragments: pageFragments }));
}
