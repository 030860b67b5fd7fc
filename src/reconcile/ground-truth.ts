import fs from "node:fs/promises";
import path from "node:path";
import { MalformedGroundTruthError, errorMessage } from "../errors.js";
import type { LabelLink } from "../types.js";

const PRODUCT_LINE = /PRODUCT:[ \t]*(.+)/;
const LABEL_LINK_LINE = /LABEL LINK:[ \t]*(https:\/\/\S+)/;

export function parseLabelFile(content: string, file: string): LabelLink {
  const productName = PRODUCT_LINE.exec(content)?.[1]?.trim() ?? "";
  const url = LABEL_LINK_LINE.exec(content)?.[1]?.trim() ?? "";

  const missing: string[] = [];
  if (!productName) {
    missing.push("PRODUCT");
  }
  if (!url) {
    missing.push("LABEL LINK");
  }
  if (missing.length > 0) {
    throw new MalformedGroundTruthError(file, missing);
  }

  return { productName, url, file };
}

export interface SkippedGroundTruth {
  file: string;
  reason: string;
}

export interface LabelLinkSet {
  links: LabelLink[];
  skipped: SkippedGroundTruth[];
}

export interface LoadLabelLinksDeps {
  readdirFn: (dir: string) => Promise<string[]>;
  readFileFn: (filePath: string) => Promise<string>;
}

/** Reads every `.txt` label file in `dir`, in file-name order. Malformed files are skipped. */
export async function loadLabelLinks(dir: string, deps?: Partial<LoadLabelLinksDeps>): Promise<LabelLinkSet> {
  const readdirFn = deps?.readdirFn ?? ((target: string) => fs.readdir(target));
  const readFileFn = deps?.readFileFn ?? ((filePath: string) => fs.readFile(filePath, "utf8"));

  const entries = await readdirFn(dir);
  const files = entries.filter((entry) => entry.endsWith(".txt")).sort();

  const links: LabelLink[] = [];
  const skipped: SkippedGroundTruth[] = [];

  for (const file of files) {
    try {
      const content = await readFileFn(path.join(dir, file));
      links.push(parseLabelFile(content, file));
    } catch (error) {
      skipped.push({ file, reason: errorMessage(error) });
    }
  }

  return { links, skipped };
}
