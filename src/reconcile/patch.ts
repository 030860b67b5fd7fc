import type { Metadata, MetadataPatch, PatchRule, RenameDirective, UnlinkPolicy } from "../types.js";
import { readString } from "./match.js";

/** Keys a metadata patch may never set or remove. */
export const IMMUTABLE_KEYS: readonly string[] = ["text"];

export const PROTECTED_LINK_DOMAINS: readonly string[] = ["greencastonline.com", "basf.ca"];

export const DEFAULT_UNLINK_POLICY: UnlinkPolicy = {
  disallowedDomains: ["epa.gov"],
  disallowedExtensions: [".txt"],
  protectedDomains: PROTECTED_LINK_DOMAINS,
};

export function createPatch(set: Metadata = {}, remove: string[] = []): MetadataPatch {
  const touched = [...Object.keys(set), ...remove];
  const immutable = touched.find((key) => IMMUTABLE_KEYS.includes(key));
  if (immutable) {
    throw new Error(`Metadata patch may not touch "${immutable}"`);
  }
  return { set: { ...set }, remove: [...new Set(remove)] };
}

export function isEmptyPatch(patch: MetadataPatch): boolean {
  return Object.keys(patch.set).length === 0 && patch.remove.length === 0;
}

export function applyPatch(metadata: Metadata, patch: MetadataPatch): Metadata {
  const merged: Metadata = { ...metadata, ...patch.set };
  for (const key of patch.remove) {
    delete merged[key];
  }
  return merged;
}

function containsAny(value: string, needles: readonly string[]): boolean {
  const lowered = value.toLowerCase();
  return needles.some((needle) => lowered.includes(needle.toLowerCase()));
}

function endsWithAny(value: string, suffixes: readonly string[]): boolean {
  const lowered = value.toLowerCase();
  return suffixes.some((suffix) => lowered.endsWith(suffix.toLowerCase()));
}

export function hasProtectedLink(metadata: Metadata, protectedDomains: readonly string[] = PROTECTED_LINK_DOMAINS): boolean {
  const labelUrl = readString(metadata, "label_url");
  return labelUrl.length > 0 && containsAny(labelUrl, protectedDomains);
}

export function buildLinkPatch(current: Metadata, url: string): MetadataPatch {
  if (hasProtectedLink(current)) {
    return createPatch();
  }
  return createPatch({ label_url: url, pdf_path: url });
}

export function buildRenamePatch(current: Metadata, directive: RenameDirective): MetadataPatch {
  const set: Metadata = {
    document_name: directive.name,
    source: directive.name,
  };
  if ("product_name" in current) {
    set.product_name = directive.name;
  }
  if (directive.type) {
    set.type = directive.type;
  }
  if (directive.brand) {
    set.brand = directive.brand;
  }
  return createPatch(set);
}

export function buildUnlinkPatch(current: Metadata, policy: UnlinkPolicy = DEFAULT_UNLINK_POLICY): MetadataPatch {
  if (hasProtectedLink(current, policy.protectedDomains)) {
    return createPatch();
  }

  const remove: string[] = [];
  const labelUrl = readString(current, "label_url");
  if (labelUrl && containsAny(labelUrl, policy.disallowedDomains)) {
    remove.push("label_url");
  }

  const pdfPath = readString(current, "pdf_path");
  if (pdfPath && (containsAny(pdfPath, policy.disallowedDomains) || endsWithAny(pdfPath, policy.disallowedExtensions))) {
    remove.push("pdf_path");
  }

  return createPatch({}, remove);
}

/** Sets the cleaned name on `source` and on whichever of `document_name`/`product_name` exist. */
export function buildTitlePatch(current: Metadata, name: string): MetadataPatch {
  const set: Metadata = { source: name };
  for (const field of ["document_name", "product_name"]) {
    if (field in current) {
      set[field] = name;
    }
  }
  return createPatch(set);
}

export function buildFilePathPatch(current: Metadata, webPath: string): MetadataPatch {
  if (readString(current, "pdf_path")) {
    return createPatch();
  }
  return createPatch({ pdf_path: webPath });
}

/** Removes each link field whose value is exactly the dead URL. */
export function buildDeadLinkPatch(current: Metadata, url: string): MetadataPatch {
  const remove = ["pdf_path", "label_url"].filter((field) => current[field] === url);
  return createPatch({}, remove);
}

export function buildTagPatch(field: string, value: string): MetadataPatch {
  return createPatch({ [field]: value });
}

export function buildPatch(current: Metadata, rule: PatchRule): MetadataPatch {
  switch (rule.kind) {
    case "link":
      return buildLinkPatch(current, rule.url);
    case "rename":
      return buildRenamePatch(current, rule.directive);
    case "unlink":
      return buildUnlinkPatch(current, rule.policy);
    case "tag":
      return buildTagPatch(rule.field, rule.value);
    case "title":
      return buildTitlePatch(current, rule.name);
    case "file":
      return buildFilePathPatch(current, rule.webPath);
    case "dead-link":
      return buildDeadLinkPatch(current, rule.url);
  }
}
