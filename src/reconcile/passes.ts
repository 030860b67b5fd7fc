import type {
  BrokenLink,
  CountryTag,
  FileLink,
  FileMatch,
  LabelLink,
  Metadata,
  RenameDirective,
  ScannedRecord,
  TitleCleanup,
  UnlinkPolicy,
} from "../types.js";
import type { DeletePass, UpdatePass } from "./driver.js";
import { nameSimilarity, normalizeFileName } from "./file-links.js";
import type { LinkCheckFn } from "./link-check.js";
import { classify, findKeyword, matchesName, NAME_FIELDS, anyFieldContains, readString, resolveDisplayName } from "./match.js";
import {
  buildDeadLinkPatch,
  buildFilePathPatch,
  buildLinkPatch,
  buildRenamePatch,
  buildTagPatch,
  buildTitlePatch,
  buildUnlinkPatch,
  createPatch,
  DEFAULT_UNLINK_POLICY,
  isEmptyPatch,
} from "./patch.js";
import {
  COUNTRY_RULES,
  DEFAULT_COUNTRY,
  FILE_LINK_THRESHOLD,
  FILE_LINK_TYPES,
  GARBAGE_NAME_PATTERNS,
  LINK_REQUIRED_TYPES,
  MAGAZINE_BRAND,
  MAGAZINE_NAME_FIELDS,
  MAGAZINE_TYPE,
  MESSY_TITLE_MARKERS,
  MONTH_NAMES,
  PESTICIDE_FILTER,
  PROGRAM_KEYWORDS,
  RESEARCH_CODE_NAME,
  TITLE_REPLACEMENTS,
} from "./rulesets.js";

export interface PassOptions {
  dryRun?: boolean;
}

export function findLabelLink(record: ScannedRecord, links: readonly LabelLink[]): LabelLink | null {
  const name = resolveDisplayName(record.metadata);
  if (!name) {
    return null;
  }
  return links.find((link) => matchesName(name, link.productName)) ?? null;
}

export function linkLabelsPass(links: readonly LabelLink[], options: PassOptions = {}): UpdatePass<LabelLink> {
  return {
    label: "link-labels",
    filter: PESTICIDE_FILTER,
    match: (record) => findLabelLink(record, links),
    buildPatch: (current, link) => buildLinkPatch(current, link.url),
    describe: (record, link) => `${resolveDisplayName(record.metadata)} -> ${link.url} (${link.file})`,
    dryRun: options.dryRun,
  };
}

export function unlinkPass(policy: UnlinkPolicy = DEFAULT_UNLINK_POLICY, options: PassOptions = {}): UpdatePass<UnlinkPolicy> {
  return {
    label: "unlink",
    match: (record) => (isEmptyPatch(buildUnlinkPatch(record.metadata, policy)) ? null : policy),
    buildPatch: (current, target) => buildUnlinkPatch(current, target),
    describe: (record) => {
      const patch = buildUnlinkPatch(record.metadata, policy);
      return `${resolveDisplayName(record.metadata) || record.id}: remove ${patch.remove.join(", ")}`;
    },
    dryRun: options.dryRun,
  };
}

export function resolveCountry(metadata: Metadata): CountryTag {
  return classify(resolveDisplayName(metadata), COUNTRY_RULES, DEFAULT_COUNTRY).outcome;
}

export function tagCountryPass(options: PassOptions = {}): UpdatePass<CountryTag> {
  return {
    label: "tag-country",
    filter: PESTICIDE_FILTER,
    match: (record) => resolveCountry(record.metadata),
    buildPatch: (current) => buildTagPatch("country", resolveCountry(current)),
    describe: (record, country) => `${resolveDisplayName(record.metadata)} -> ${country}`,
    dryRun: options.dryRun,
  };
}

export function renamePass(directive: RenameDirective, options: PassOptions = {}): UpdatePass<RenameDirective> {
  return {
    label: "rename",
    match: (record) => (anyFieldContains(record.metadata, NAME_FIELDS, directive.fragment) ? directive : null),
    buildPatch: (current, target) => buildRenamePatch(current, target),
    describe: (record, target) => `${resolveDisplayName(record.metadata)} -> ${target.name}`,
    confirm: true,
    dryRun: options.dryRun,
  };
}

const MAGAZINE_ISSUE = /^(\d{4})(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)/;

export function magazineIssueName(value: string): string | null {
  const match = MAGAZINE_ISSUE.exec(value.toLowerCase());
  if (!match) {
    return null;
  }
  const [, year, month] = match;
  const monthName = month ? MONTH_NAMES[month] : undefined;
  if (!year || !monthName) {
    return null;
  }
  return `${MAGAZINE_BRAND} ${monthName} ${year}`;
}

export function findMagazineRename(metadata: Metadata): RenameDirective | null {
  for (const field of MAGAZINE_NAME_FIELDS) {
    const value = readString(metadata, field);
    const name = magazineIssueName(value);
    if (name) {
      return { fragment: value, name, type: MAGAZINE_TYPE, brand: MAGAZINE_BRAND };
    }
  }
  return null;
}

export function magazineRenamePass(options: PassOptions = {}): UpdatePass<RenameDirective> {
  return {
    label: "rename-magazines",
    match: (record) => findMagazineRename(record.metadata),
    buildPatch: (current, target) => buildRenamePatch(current, target),
    describe: (record, target) => `${target.fragment} -> ${target.name} [${record.id}]`,
    confirm: true,
    dryRun: options.dryRun,
  };
}

export function cleanTitle(name: string): string {
  let cleaned = name;
  for (const [from, to] of TITLE_REPLACEMENTS) {
    cleaned = cleaned.replaceAll(from, to);
  }
  return cleaned.trim();
}

export function findTitleCleanup(metadata: Metadata): TitleCleanup | null {
  const name = resolveDisplayName(metadata);
  if (!MESSY_TITLE_MARKERS.some((marker) => name.includes(marker))) {
    return null;
  }
  const cleaned = cleanTitle(name);
  if (!cleaned || cleaned === name) {
    return null;
  }
  return { from: name, to: cleaned };
}

export function titleCleanupPass(options: PassOptions = {}): UpdatePass<TitleCleanup> {
  return {
    label: "clean-titles",
    match: (record) => findTitleCleanup(record.metadata),
    buildPatch: (current) => {
      const cleanup = findTitleCleanup(current);
      return cleanup ? buildTitlePatch(current, cleanup.to) : createPatch();
    },
    describe: (_record, cleanup) => `${cleanup.from} -> ${cleanup.to}`,
    confirm: true,
    dryRun: options.dryRun,
  };
}

/** Best-scoring file for a product record that has no `pdf_path` yet, if it clears the threshold. */
export function findFileLink(metadata: Metadata, files: readonly FileLink[]): FileMatch | null {
  const name = resolveDisplayName(metadata);
  if (!name || RESEARCH_CODE_NAME.test(name.toLowerCase())) {
    return null;
  }
  if (!FILE_LINK_TYPES.includes(readString(metadata, "type")) || readString(metadata, "pdf_path")) {
    return null;
  }
  const normalized = normalizeFileName(name);
  if (!normalized) {
    return null;
  }

  let best: FileMatch | null = null;
  for (const link of files) {
    const score = nameSimilarity(normalized, link.name);
    if (score > (best?.score ?? 0)) {
      best = { link, score };
    }
  }
  return best !== null && best.score > FILE_LINK_THRESHOLD ? best : null;
}

export function linkFilesPass(files: readonly FileLink[], options: PassOptions = {}): UpdatePass<FileMatch> {
  return {
    label: "link-files",
    filter: { type: { $in: [...FILE_LINK_TYPES] } },
    match: (record) => findFileLink(record.metadata, files),
    buildPatch: (current, match) => buildFilePathPatch(current, match.link.webPath),
    describe: (record, match) =>
      `${resolveDisplayName(record.metadata)} -> ${match.link.webPath} (score ${match.score.toFixed(2)})`,
    dryRun: options.dryRun,
  };
}

/** The link a record displays: `pdf_path`, else `label_url`. */
export function displayLink(metadata: Metadata): string {
  return readString(metadata, "pdf_path") || readString(metadata, "label_url");
}

export interface BrokenLinkPassOptions extends PassOptions {
  onChecked?: (checked: number, total: number) => void;
}

export interface BrokenLinkPass extends UpdatePass<BrokenLink> {
  /** Every distinct link checked by `prepare`, with why it is dead or null when it answered. */
  readonly results: ReadonlyMap<string, string | null>;
}

export function brokenLinkPass(checkLink: LinkCheckFn, options: BrokenLinkPassOptions = {}): BrokenLinkPass {
  const results = new Map<string, string | null>();

  return {
    label: "unlink-broken",
    results,
    prepare: async (records) => {
      const urls = [...new Set(records.map((record) => displayLink(record.metadata)).filter(Boolean))];
      for (const url of urls) {
        results.set(url, await checkLink(url));
        options.onChecked?.(results.size, urls.length);
      }
    },
    match: (record) => {
      const url = displayLink(record.metadata);
      const reason = url ? results.get(url) : null;
      return reason ? { url, reason } : null;
    },
    buildPatch: (current, broken) => buildDeadLinkPatch(current, broken.url),
    describe: (record, broken) => `${resolveDisplayName(record.metadata) || record.id}: ${broken.url} (${broken.reason})`,
    confirm: true,
    dryRun: options.dryRun,
  };
}

export function keywordDeletePass(keywords: readonly string[], options: PassOptions = {}): DeletePass {
  return {
    label: "delete",
    match: (record) => {
      const keyword = findKeyword(resolveDisplayName(record.metadata), keywords);
      return keyword === null ? null : `matches "${keyword}"`;
    },
    dryRun: options.dryRun,
  };
}

/** Ordered prune checks; the first one that applies names the reason. */
export function pruneReason(metadata: Metadata): string | null {
  const name = resolveDisplayName(metadata);
  const type = readString(metadata, "type");

  const garbage = GARBAGE_NAME_PATTERNS.find((pattern) => pattern.test(name));
  if (garbage) {
    return `garbage name pattern ${garbage.source}`;
  }

  const lowered = name.toLowerCase();
  const isProgram = PROGRAM_KEYWORDS.some((keyword) => lowered.includes(keyword));
  if (lowered.includes("equipment") && (type === "pesticide_label" || type === "ntep_trial") && !isProgram) {
    return "equipment label or trial";
  }

  if (type === "reference_document") {
    return "reference_document type";
  }

  const url = readString(metadata, "pdf_path") || readString(metadata, "label_url");
  if (!url && LINK_REQUIRED_TYPES.includes(type)) {
    return "no link to display";
  }

  return null;
}

export function prunePass(options: PassOptions = {}): DeletePass {
  return {
    label: "prune",
    match: (record) => pruneReason(record.metadata),
    dryRun: options.dryRun,
  };
}
