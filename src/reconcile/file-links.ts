import fs from "node:fs/promises";
import path from "node:path";
import { distance } from "fastest-levenshtein";
import type { FileLink } from "../types.js";
import { FILE_LINK_EXTENSIONS } from "./rulesets.js";

/**
 * Reduces a product or file name to lowercase words: drops the extension, EPA registration
 * numbers such as `100-1326` and separators.
 */
export function normalizeFileName(name: string): string {
  return name
    .toLowerCase()
    .replace(/\.(pdf|txt)$/, "")
    .replace(/_?\d{2,6}-\d{1,4}/g, "")
    .replace(/_-$/, "")
    .replace(/-$/, "")
    .replaceAll("_", " ")
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Edit-distance similarity in [0, 1]; 1 means identical. */
export function nameSimilarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) {
    return 1;
  }
  return 1 - distance(a, b) / longest;
}

export interface FileLinkSet {
  files: FileLink[];
  missingDirs: string[];
}

export interface LoadFileLinksDeps {
  /** Lists every entry below `dir`, recursively, as paths relative to `dir`. */
  listFilesFn: (dir: string) => Promise<string[]>;
  rootDir: string;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function toWebPath(rootDir: string, filePath: string): string {
  return "/" + path.relative(rootDir, filePath).split(path.sep).join("/");
}

/**
 * Collects the `.pdf` and `.txt` files under each folder, in folder order and then sorted path
 * order. Web paths are rooted at `rootDir`. Folders that do not exist are reported, not fatal.
 */
export async function loadFileLinks(dirs: readonly string[], deps?: Partial<LoadFileLinksDeps>): Promise<FileLinkSet> {
  const listFilesFn = deps?.listFilesFn ?? ((dir: string) => fs.readdir(dir, { recursive: true }));
  const rootDir = deps?.rootDir ?? process.cwd();

  const files: FileLink[] = [];
  const missingDirs: string[] = [];

  for (const dir of dirs) {
    const absolute = path.resolve(rootDir, dir);
    let entries: string[];
    try {
      entries = await listFilesFn(absolute);
    } catch (error) {
      if (isNotFound(error)) {
        missingDirs.push(dir);
        continue;
      }
      throw error;
    }

    for (const entry of [...entries].sort()) {
      const file = path.basename(entry);
      if (!FILE_LINK_EXTENSIONS.some((extension) => file.endsWith(extension))) {
        continue;
      }
      files.push({ file, name: normalizeFileName(file), webPath: toWebPath(rootDir, path.join(absolute, entry)) });
    }
  }

  return { files, missingDirs };
}
