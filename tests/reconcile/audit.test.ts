import { describe, expect, it } from "vitest";
import { categorizeSource, countByCategory, listNames, summarizeSources } from "../../src/reconcile/audit.js";
import type { Metadata, ScannedRecord } from "../../src/types.js";

function scanned(id: string, metadata: Metadata): ScannedRecord {
  return { id, score: 0, metadata };
}

describe("categorizeSource", () => {
  it("treats public document types as public regardless of name", () => {
    expect(categorizeSource("Bayer brochure", "pesticide_label")).toBe("public");
  });

  it("applies the category rules in order", () => {
    expect(categorizeSource("Bayer Solution Sheet", "university_extension")).toBe("manufacturer");
    expect(categorizeSource("Turf Journal Article", "equipment_catalog")).toBe("copyrighted");
    expect(categorizeSource("University Turf Journal", "equipment_catalog")).toBe("public");
    expect(categorizeSource("Mystery", "equipment_catalog")).toBe("unknown");
  });
});

describe("summarizeSources", () => {
  it("groups chunks by display name and sorts by name", () => {
    const sources = summarizeSources([
      scanned("1", { product_name: "Banner Maxx", type: "pesticide_label" }),
      scanned("2", { document_name: "Aeration Notes", type: "equipment_catalog" }),
      scanned("3", { product_name: "Banner Maxx", type: "pesticide_product" }),
    ]);

    expect(sources).toEqual([
      { name: "Aeration Notes", type: "equipment_catalog", chunks: 1, category: "unknown" },
      { name: "Banner Maxx", type: "pesticide_label", chunks: 2, category: "public" },
    ]);
    expect(countByCategory(sources)).toEqual({ public: 1, manufacturer: 0, copyrighted: 0, unknown: 1 });
  });

  it("groups nameless chunks together", () => {
    expect(summarizeSources([scanned("1", {}), scanned("2", { text: "body" })])).toEqual([
      { name: "(unnamed)", type: "unknown", chunks: 2, category: "unknown" },
    ]);
  });
});

describe("listNames", () => {
  it("lists the first records with fallbacks for missing fields", () => {
    const records = [
      scanned("1", { product_name: "Heritage", type: "pesticide_product", brand: "Syngenta" }),
      scanned("2", { text: "body" }),
      scanned("3", { product_name: "Lexicon" }),
    ];

    expect(listNames(records, 2)).toEqual([
      { id: "1", name: "Heritage", type: "pesticide_product", brand: "Syngenta" },
      { id: "2", name: "NO NAME", type: "unknown", brand: "unknown" },
    ]);
  });
});
