import { describe, expect, it, vi } from "vitest";
import type { RawOcrRecord } from "./fragment-parse.ts";
import { LayoutReconstructionError } from "./errors.ts";
import {
  composePage,
  composeReadingOrder,
  concatenateInInputOrder,
  reconstructLayout,
} from "./reading-order.ts";
import { parseFragments } from "./fragment-parse.ts";

describe("composePage", () => {
  it("emits no column marker for a single-column page", () => {
    const fragments = parseFragments([
      record("Heading", 0, { left: 0.1, top: 0.02, right: 0.6, bottom: 0.05 }),
      record("Body", 0, { left: 0.1, top: 0.06, right: 0.7, bottom: 0.08 }),
    ]);
    expect(composePage(fragments)).toBe("Heading\nBody");
  });

  it("places the left column first with one marker between columns", () => {
    const fragments = parseFragments([
      record("Right top", 0, { left: 0.55, top: 0.02, right: 0.95, bottom: 0.04 }),
      record("Left top", 0, { left: 0.05, top: 0.02, right: 0.45, bottom: 0.04 }),
      record("Left bottom", 0, { left: 0.05, top: 0.05, right: 0.45, bottom: 0.07 }),
    ]);
    expect(composePage(fragments)).toBe("Left top\nLeft bottom\n\n[Column Break]\n\nRight top");
  });
});

describe("composeReadingOrder", () => {
  it("joins pages with page markers in page order", () => {
    const fragments = parseFragments([
      record("Page two", 2, { left: 0.1, top: 0.02, right: 0.5, bottom: 0.04 }),
      record("Page zero", 0, { left: 0.1, top: 0.02, right: 0.5, bottom: 0.04 }),
      record("Page one", 1, { left: 0.1, top: 0.02, right: 0.5, bottom: 0.04 }),
    ]);
    const pages = [0, 1, 2].map((pageNumber) => ({
      pageNumber,
      fragments: fragments.filter((fragment) => fragment.page === pageNumber),
    }));
    expect(composeReadingOrder(pages)).toBe(
      "Page zero\n\n--- Page Break ---\n\nPage one\n\n--- Page Break ---\n\nPage two",
    );
  });

  it("returns an empty string without pages", () => {
    expect(composeReadingOrder([])).toBe("");
  });
});

describe("concatenateInInputOrder", () => {
  it("joins texts by input index", () => {
    const [first, second] = parseFragments([{ text: "one" }, { text: "two" }]);
    expect(concatenateInInputOrder([second, first])).toBe("one\ntwo");
  });
});

describe("reconstructLayout", () => {
  it("returns empty output for empty input", () => {
    expect(reconstructLayout([])).toEqual({
      ok: true,
      text: "",
      fragments: [],
      classifications: [],
      structure: { totalPages: 0, totalChunks: 0, pages: {} },
    });
  });

  it("returns empty output when every record is blank", () => {
    const result = reconstructLayout([{ text: " " }, { text: "" }]);
    expect(result.ok).toBe(true);
    expect(result.text).toBe("");
    expect(result.structure.totalChunks).toBe(0);
  });

  it("reconstructs a two-page, two-column document", () => {
    const result = reconstructLayout(twoPageDocument());

    expect(result.ok).toBe(true);
    expect(result.text).toBe(
      [
        "Title",
        "",
        "Left body",
        "",
        "[Column Break]",
        "",
        "",
        "Right body",
        "",
        "--- Page Break ---",
        "",
        "Closing",
      ].join("\n"),
    );
    expect(countOccurrences(result.text, "--- Page Break ---")).toBe(1);
    expect(countOccurrences(result.text, "[Column Break]")).toBe(1);
  });

  it("classifies every kept fragment in input order", () => {
    const result = reconstructLayout(twoPageDocument());
    expect(result.fragments.map((fragment) => fragment.text)).toEqual([
      "Right body",
      "Title",
      "Left body",
      "Closing",
    ]);
    expect(result.classifications).toEqual([
      { fontSize: 10, textType: "body" },
      { fontSize: 36, textType: "large_title" },
      { fontSize: 10, textType: "body" },
      { fontSize: 10, textType: "body" },
    ]);
  });

  it("reports per-page structure", () => {
    expect(reconstructLayout(twoPageDocument()).structure).toEqual({
      totalPages: 2,
      totalChunks: 4,
      pages: {
        0: { chunks: 3, columns: 2, hasMultiColumn: true },
        1: { chunks: 1, columns: 1, hasMultiColumn: false },
      },
    });
  });

  it("applies a custom calibration factor", () => {
    const result = reconstructLayout(
      [record("Small", 0, { left: 0, top: 0, right: 1, bottom: 0.025 })],
      { calibrationFactor: 800 },
    );
    expect(result.classifications).toEqual([{ fontSize: 20, textType: "subheading" }]);
  });

  it("keeps the configured calibration factor when an option is left undefined", async () => {
    vi.resetModules();
    vi.stubEnv("LAYOUT_CALIBRATION_FACTOR", "800");

    try {
      const module = await import("./reading-order.ts");
      const records = [record("Small", 0, { left: 0, top: 0, right: 1, bottom: 0.025 })];
      const expected = [{ fontSize: 20, textType: "subheading" }];

      expect(module.reconstructLayout(records).classifications).toEqual(expected);
      expect(module.reconstructLayout(records, { calibrationFactor: undefined }).classifications).toEqual(
        expected,
      );
      expect(module.reconstructLayout(records, { calibrationFactor: 400 }).classifications).toEqual([
        { fontSize: 10, textType: "body" },
      ]);
    } finally {
      vi.unstubAllEnvs();
      vi.resetModules();
    }
  });

  it("leaves blank records out of the text and the counts", () => {
    const records = [...twoPageDocument(), { text: "   ", grounding: { page: 7 } }, { text: "" }];
    const result = reconstructLayout(records);
    expect(result.structure.totalPages).toBe(2);
    expect(result.structure.totalChunks).toBe(4);
    expect(result.classifications).toHaveLength(4);
    expect(result.text).toBe(reconstructLayout(twoPageDocument()).text);
  });

  it("is deterministic across runs", () => {
    const first = reconstructLayout(twoPageDocument());
    const second = reconstructLayout(twoPageDocument());
    expect(second.text).toBe(first.text);
  });

  it("falls back to input-order concatenation when composing fails", () => {
    const composeReadingOrderMock = vi.fn(() => {
      throw new Error("column index out of range");
    });

    const result = reconstructLayout(twoPageDocument(), {}, {
      composeReadingOrder: composeReadingOrderMock,
    });

    expect(composeReadingOrderMock).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    expect(result.text).toBe("Right body\nTitle\nLeft body\nClosing");
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(LayoutReconstructionError);
      expect(result.error.message).toBe("Layout reconstruction failed: column index out of range");
    }
    expect(result.classifications).toHaveLength(4);
  });

  it("falls back on non-error throws as well", () => {
    const result = reconstructLayout([{ text: "only" }], {}, {
      composeReadingOrder: () => {
        throw "boom";
      },
    });
    expect(result.ok).toBe(false);
    expect(result.text).toBe("only");
    if (!result.ok) expect(result.error.message).toBe("Layout reconstruction failed: Unknown error");
  });

  it("passes pages to the composer in ascending order", () => {
    const observedPages: number[][] = [];
    reconstructLayout(twoPageDocument(), {}, {
      composeReadingOrder: (pages) => {
        observedPages.push(pages.map((page) => page.pageNumber));
        return "";
      },
    });
    expect(observedPages).toEqual([[0, 1]]);
  });
});

function twoPageDocument(): RawOcrRecord[] {
  return [
    record("Right body", 0, { left: 0.55, top: 0.2, right: 0.95, bottom: 0.225 }),
    record("Title", 0, { left: 0.05, top: 0.01, right: 0.45, bottom: 0.1 }),
    record("Left body", 0, { left: 0.05, top: 0.2, right: 0.45, bottom: 0.225 }),
    record("Closing", 1, { left: 0.1, top: 0.03, right: 0.9, bottom: 0.055 }),
  ];
}

function record(
  text: string,
  page: number,
  box: { left: number; top: number; right: number; bottom: number },
): RawOcrRecord {
  return { text, grounding: { page, box } };
}

function countOccurrences(text: string, marker: string): number {
  return text.split(marker).length - 1;
}
