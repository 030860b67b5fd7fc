import { describe, expect, it, vi } from "vitest";
import { runAuditCommand, runNamesCommand, runStatsCommand } from "../../src/commands/audit.js";
import { makeCommandDeps } from "../helpers/command-deps.js";
import { MemoryStore, record } from "../helpers/memory-store.js";

describe("stats command", () => {
  it("reports counts and warns when the index outgrows the scan cap", async () => {
    const store = new MemoryStore([], { totalRecordCount: 20_000 });
    const { deps, info, warn } = makeCommandDeps(store);

    const result = await runStatsCommand({}, deps);

    expect(result).toEqual({
      exitCode: 0,
      summary: { totalRecordCount: 20_000, dimension: 4, scanCap: 1000, mayBeIncomplete: true },
    });
    expect(info).toEqual(["Records: 20000", "Dimension: 4", "Scan cap: 1000"]);
    expect(warn).toEqual(["The index holds more records than one scan returns; passes see at most 1000."]);
    expect(store.queries).toHaveLength(0);
  });
});

describe("names command", () => {
  it("lists the first records of one type", async () => {
    const store = new MemoryStore([
      record("b", { product_name: "Banner Maxx", type: "pesticide_label" }),
      record("c", { product_name: "Tenacity", type: "pesticide_label", brand: "Syngenta" }),
      record("h", { product_name: "Heritage", type: "pesticide_product" }),
    ]);
    const { deps } = makeCommandDeps(store);
    const noteFn = vi.fn();

    const result = await runNamesCommand({ limit: 1, type: "pesticide_label" }, { ...deps, noteFn });

    expect(store.queries[0]?.filter).toEqual({ type: "pesticide_label" });
    expect(result.summary).toEqual([{ id: "b", name: "Banner Maxx", type: "pesticide_label", brand: "unknown" }]);
    expect(noteFn).toHaveBeenCalledWith("Banner Maxx | pesticide_label | unknown [b]", "First 1 of 2");
  });

  it("warns when the type has no records", async () => {
    const store = new MemoryStore([record("h", { product_name: "Heritage", type: "pesticide_product" })]);
    const { deps, warn } = makeCommandDeps(store);

    const result = await runNamesCommand({ type: "ntep_trial" }, { ...deps, noteFn: vi.fn() });

    expect(result.summary).toEqual([]);
    expect(warn).toEqual(['No records of type "ntep_trial".']);
  });
});

describe("audit command", () => {
  it("groups sources by category without writing", async () => {
    const store = new MemoryStore([
      record("1", { product_name: "Heritage", type: "pesticide_label" }),
      record("2", { document_name: "Bayer Solution Sheet", type: "university_extension" }),
      record("3", { document_name: "Mystery", type: "equipment_catalog" }),
    ]);
    const { deps, info } = makeCommandDeps(store);
    const noteFn = vi.fn();

    const result = await runAuditCommand({}, { ...deps, noteFn });

    expect(result.summary?.categories).toEqual({ public: 1, manufacturer: 1, copyrighted: 0, unknown: 1 });
    expect(noteFn.mock.calls).toEqual([
      ["Bayer Solution Sheet (university_extension, 1 chunks)", "manufacturer: 1"],
      ["Mystery (equipment_catalog, 1 chunks)", "unknown: 1"],
    ]);
    expect(info).toEqual([
      "audit: scan returned 3 of cap 1000 (index reports 3 records)",
      "audit: 3 sources; public=1 manufacturer=1 copyrighted=0 unknown=1",
    ]);
    expect(store.upserts).toHaveLength(0);
    expect(store.deletes).toHaveLength(0);
  });
});
