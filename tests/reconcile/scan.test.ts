import { describe, expect, it } from "vitest";
import { mayBeIncomplete, neutralVector, scanIndex } from "../../src/reconcile/scan.js";
import { MemoryStore, record } from "../helpers/memory-store.js";

function threeRecords(): MemoryStore {
  return new MemoryStore([
    record("a", { product_name: "Heritage", type: "pesticide_product" }),
    record("b", { product_name: "Banner Maxx", type: "pesticide_label" }),
    record("c", { document_name: "Bermudagrass Guide", type: "university_extension" }),
  ]);
}

describe("scanIndex", () => {
  it("issues one zero-vector query capped at the scan cap", async () => {
    const store = threeRecords();

    const result = await scanIndex(store, { cap: 2, dimension: 4, totalRecordCount: 3 });

    expect(store.queries).toEqual([{ vector: [0, 0, 0, 0], topK: 2, filter: undefined, includeMetadata: true }]);
    expect(result.records.map((item) => item.id)).toEqual(["a", "b"]);
    expect(result.coverage).toEqual({ cap: 2, returned: 2, capReached: true, totalRecordCount: 3 });
  });

  it("passes the metadata filter through", async () => {
    const store = threeRecords();

    const result = await scanIndex(store, {
      cap: 10,
      dimension: 4,
      filter: { type: { $in: ["pesticide_product", "pesticide_label"] } },
    });

    expect(result.records.map((item) => item.id)).toEqual(["a", "b"]);
    expect(result.coverage).toEqual({ cap: 10, returned: 2, capReached: false, totalRecordCount: null });
  });

  it("rejects caps outside the store ceiling", async () => {
    const store = threeRecords();

    await expect(scanIndex(store, { cap: 0, dimension: 4 })).rejects.toThrow(
      "Scan cap must be an integer between 1 and 10000, got: 0",
    );
    await expect(scanIndex(store, { cap: 10_001, dimension: 4 })).rejects.toThrow(
      "Scan cap must be an integer between 1 and 10000, got: 10001",
    );
    expect(store.queries).toHaveLength(0);
  });

  it("rejects a non-positive dimension", async () => {
    await expect(scanIndex(threeRecords(), { cap: 5, dimension: 0 })).rejects.toThrow(
      "Index dimension must be a positive integer, got: 0",
    );
  });
});

describe("coverage", () => {
  it("builds an all-zero vector of the index dimension", () => {
    expect(neutralVector(3)).toEqual([0, 0, 0]);
  });

  it("flags scans that hit the cap or that the index outgrows", () => {
    expect(mayBeIncomplete({ cap: 5, returned: 5, capReached: true, totalRecordCount: null })).toBe(true);
    expect(mayBeIncomplete({ cap: 10, returned: 3, capReached: false, totalRecordCount: 20 })).toBe(true);
    expect(mayBeIncomplete({ cap: 10, returned: 3, capReached: false, totalRecordCount: 3 })).toBe(false);
    expect(mayBeIncomplete({ cap: 10, returned: 3, capReached: false, totalRecordCount: null })).toBe(false);
  });
});
