import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadFileLinks, nameSimilarity, normalizeFileName } from "../../src/reconcile/file-links.js";

const tempDirs: string[] = [];

async function makeTempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "vecmend-files-test-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(async () => {
  for (const dir of tempDirs) {
    await fs.rm(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function notFound(dir: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, scandir '${dir}'`), { code: "ENOENT" });
}

describe("normalizeFileName", () => {
  it("drops the extension and the EPA registration number", () => {
    expect(normalizeFileName("Heritage_TL_100-1326.pdf")).toBe("heritage tl");
  });

  it("drops a trailing dash left behind by the registration number", () => {
    expect(normalizeFileName("Primo_MAXX_100-937_-.txt")).toBe("primo maxx");
  });

  it("turns punctuation into single spaces", () => {
    expect(normalizeFileName("banner-maxx-ii.pdf")).toBe("banner maxx ii");
    expect(normalizeFileName("  Tenacity (Herbicide) ")).toBe("tenacity herbicide");
  });
});

describe("nameSimilarity", () => {
  it("is one minus the edit distance over the longer length", () => {
    expect(nameSimilarity("heritage tl", "heritage tl")).toBe(1);
    expect(nameSimilarity("banner maxx", "banner maxx ii")).toBeCloseTo(11 / 14, 10);
    expect(nameSimilarity("banner maxx", "primo maxx")).toBeCloseTo(5 / 11, 10);
  });

  it("treats two empty names as identical", () => {
    expect(nameSimilarity("", "")).toBe(1);
  });
});

describe("loadFileLinks", () => {
  it("keeps .pdf and .txt files in sorted order with web paths under the root", async () => {
    const listFilesFn = vi.fn(async (dir: string) => {
      if (dir === "/srv/app/static/epa_labels") {
        return ["x/Heritage.pdf", "b.txt", "a_label.PDF", "x"];
      }
      throw notFound(dir);
    });

    const result = await loadFileLinks(["static/epa_labels", "static/pdfs"], { listFilesFn, rootDir: "/srv/app" });

    expect(listFilesFn).toHaveBeenCalledWith("/srv/app/static/pdfs");
    expect(result).toEqual({
      files: [
        { file: "b.txt", name: "b", webPath: "/static/epa_labels/b.txt" },
        { file: "Heritage.pdf", name: "heritage", webPath: "/static/epa_labels/x/Heritage.pdf" },
      ],
      missingDirs: ["static/pdfs"],
    });
  });

  it("rethrows errors other than a missing folder", async () => {
    const listFilesFn = async () => {
      throw Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
    };

    await expect(loadFileLinks(["static/pdfs"], { listFilesFn, rootDir: "/srv/app" })).rejects.toThrow(
      "EACCES: permission denied",
    );
  });

  it("walks nested folders on disk", async () => {
    const root = await makeTempDir();
    await fs.mkdir(path.join(root, "static", "pdfs", "sub"), { recursive: true });
    await fs.writeFile(path.join(root, "static", "pdfs", "banner-maxx-ii.pdf"), "");
    await fs.writeFile(path.join(root, "static", "pdfs", "notes.doc"), "");
    await fs.writeFile(path.join(root, "static", "pdfs", "sub", "Heritage_TL_100-1326.pdf"), "");

    const result = await loadFileLinks(["static/pdfs", "static/missing"], { rootDir: root });

    expect(result).toEqual({
      files: [
        { file: "banner-maxx-ii.pdf", name: "banner maxx ii", webPath: "/static/pdfs/banner-maxx-ii.pdf" },
        { file: "Heritage_TL_100-1326.pdf", name: "heritage tl", webPath: "/static/pdfs/sub/Heritage_TL_100-1326.pdf" },
      ],
      missingDirs: ["static/missing"],
    });
  });
});
