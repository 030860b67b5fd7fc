export type MetadataValue = string | number | boolean | string[];

export type Metadata = Record<string, MetadataValue>;

/** Equality/inclusion predicate in the store's filter syntax, e.g. `{ type: { $in: [...] } }`. */
export type MetadataFilter = Record<string, unknown>;

export const DOCUMENT_TYPES = [
  "pesticide_product",
  "pesticide_label",
  "university_extension",
  "equipment_catalog",
  "reference_document",
  "system_instruction",
  "ntep_trial",
] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export const COUNTRY_TAGS = ["USA", "Canada", "USA,Canada"] as const;

export type CountryTag = (typeof COUNTRY_TAGS)[number];

export interface StoredRecord {
  id: string;
  values: number[];
  metadata: Metadata;
}

export interface ScannedRecord {
  id: string;
  score: number;
  metadata: Metadata;
}

export interface ApproximateCoverage {
  cap: number;
  returned: number;
  /** The store returned as many matches as the cap allowed, so records may have been left out. */
  capReached: boolean;
  totalRecordCount: number | null;
}

export interface ScanResult {
  records: ScannedRecord[];
  coverage: ApproximateCoverage;
}

export interface MetadataPatch {
  set: Metadata;
  remove: string[];
}

export interface LabelLink {
  productName: string;
  url: string;
  file: string;
}

/** A file found under one of the document folders, keyed by its normalized name. */
export interface FileLink {
  file: string;
  name: string;
  webPath: string;
}

export interface FileMatch {
  link: FileLink;
  score: number;
}

export interface TitleCleanup {
  from: string;
  to: string;
}

export interface BrokenLink {
  url: string;
  reason: string;
}

export interface RenameDirective {
  fragment: string;
  name: string;
  type?: DocumentType;
  brand?: string;
}

export interface ClassificationRule<T> {
  label: string;
  keywords: readonly string[];
  outcome: T;
}

export interface UnlinkPolicy {
  disallowedDomains: readonly string[];
  disallowedExtensions: readonly string[];
  protectedDomains: readonly string[];
}

export type PatchRule =
  | { kind: "link"; url: string }
  | { kind: "rename"; directive: RenameDirective }
  | { kind: "unlink"; policy: UnlinkPolicy }
  | { kind: "tag"; field: string; value: string }
  | { kind: "title"; name: string }
  | { kind: "file"; webPath: string }
  | { kind: "dead-link"; url: string };

export interface PassSummary {
  label: string;
  scanned: number;
  matched: number;
  updated: number;
  skipped: number;
  removed: number;
  errors: number;
  cancelled: boolean;
  dryRun: boolean;
  coverage: ApproximateCoverage;
}

export type LogLevel = "info" | "warn" | "error";

export interface VecmendConfig {
  index: string;
  namespace?: string;
  dimension: number;
  scanCap: number;
  labelsDir: string;
  logLevel: LogLevel;
}
