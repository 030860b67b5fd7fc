import type { ClassificationRule, CountryTag, DocumentType, MetadataFilter } from "../types.js";

export const PESTICIDE_FILTER: MetadataFilter = {
  type: { $in: ["pesticide_product", "pesticide_label"] },
};

export const COUNTRY_RULES: readonly ClassificationRule<CountryTag>[] = [
  { label: "canada-only", keywords: ["dedicate stressgard"], outcome: "Canada" },
  { label: "both-countries", keywords: ["heritage", "primo maxx", "tenacity", "lexicon"], outcome: "USA,Canada" },
];

export const DEFAULT_COUNTRY: CountryTag = "USA";

export type SourceCategory = "public" | "manufacturer" | "copyrighted" | "unknown";

export const SOURCE_CATEGORY_RULES: readonly ClassificationRule<SourceCategory>[] = [
  {
    label: "public-domain",
    keywords: ["epa", "usda", "extension", ".edu", "ntep", "state", "university", "label", "sds", "msds", "specimen"],
    outcome: "public",
  },
  {
    label: "likely-copyrighted",
    keywords: ["journal", "textbook", "book", "chapter", "article"],
    outcome: "copyrighted",
  },
  {
    label: "manufacturer",
    keywords: [
      "bayer",
      "syngenta",
      "basf",
      "corteva",
      "pbi gordon",
      "nufarm",
      "fmc",
      "quali-pro",
      "primesource",
      "solution sheet",
      "brochure",
    ],
    outcome: "manufacturer",
  },
];

/** Document types that are public regardless of name. */
export const PUBLIC_DOCUMENT_TYPES: readonly string[] = ["pesticide_label", "research_trial", "ntep_trial"];

export const MAGAZINE_BRAND = "GCM Magazine";
export const MAGAZINE_TYPE: DocumentType = "university_extension";
export const MAGAZINE_NAME_FIELDS = ["document_name", "source", "original_filename"] as const;

export const MONTH_NAMES: Readonly<Record<string, string>> = {
  jan: "January",
  feb: "February",
  mar: "March",
  apr: "April",
  may: "May",
  jun: "June",
  jul: "July",
  aug: "August",
  sep: "September",
  oct: "October",
  nov: "November",
  dec: "December",
};

export const GARBAGE_NAME_PATTERNS: readonly RegExp[] = [
  /^[a-f0-9]{32,}/,
  /^\d{12,}/,
  /^[A-F0-9]{10,}/,
  /^4\s/,
  /⊠/,
  /^chunk-/,
  /^local-/,
  /EPA Label: .+_\d+-\d+/,
  /Pesticide Label: .+ Label/,
];

/** Types whose records are useless in the resource library without a link. */
export const LINK_REQUIRED_TYPES: readonly string[] = ["pesticide_label", "ntep_trial", "university_extension"];

/** Agronomic program names mention these; they are kept even when they also mention equipment. */
export const PROGRAM_KEYWORDS: readonly string[] = ["greens", "fairway", "tees", "bermudagrass", "bentgrass", "day"];

/** Substrings that mark a display name as needing cleanup. */
export const MESSY_TITLE_MARKERS: readonly string[] = ["EPA Label:", "Pesticide Label:", "research-", "chunk-", "_", "--"];

/** Applied in order; each replaces every occurrence. */
export const TITLE_REPLACEMENTS: readonly (readonly [string, string])[] = [
  ["EPA Label: ", ""],
  ["Pesticide Label: ", ""],
  ["_", " "],
  ["--", "-"],
  ["research-", ""],
];

export const FILE_LINK_DIRS: readonly string[] = [
  "static/epa_labels",
  "static/equipment_manuals",
  "static/floratine_products",
  "static/ntep_pdfs",
  "static/pdfs",
  "static/pesticide_pdfs",
];

export const FILE_LINK_EXTENSIONS: readonly string[] = [".pdf", ".txt"];

/** Only these types carry product names that correspond to file names. */
export const FILE_LINK_TYPES: readonly string[] = ["pesticide_product", "pesticide_label", "ntep_trial"];

/** Research paper codes such as `cs15l_21-13f`; no file is named after them. */
export const RESEARCH_CODE_NAME = /^[a-z]{2}\d{2}[_-]/;

/** A file link is only applied when the best similarity is strictly above this. */
export const FILE_LINK_THRESHOLD = 0.4;
