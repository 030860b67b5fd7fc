export * from "./types.js";
export * from "./errors.js";
export { readConfig, resolveApiKey, resolveConfigPath, resolveScanCap, MAX_SCAN_CAP } from "./config.js";
export type { StoreClient, QueryParams, QueryResult, FetchResult, IndexStats } from "./store/client.js";
export { PineconeStoreClient, type PineconeStoreOptions } from "./store/pinecone.js";
export { scanIndex, mayBeIncomplete, neutralVector } from "./reconcile/scan.js";
export { matchesName, normalizeName, resolveDisplayName, classify } from "./reconcile/match.js";
export { createPatch, applyPatch, buildPatch, isEmptyPatch, DEFAULT_UNLINK_POLICY } from "./reconcile/patch.js";
export { loadLabelLinks, parseLabelFile } from "./reconcile/ground-truth.js";
export { loadFileLinks, nameSimilarity, normalizeFileName, type FileLinkSet } from "./reconcile/file-links.js";
export { createLinkChecker, type LinkCheckFn } from "./reconcile/link-check.js";
export {
  ReconciliationDriver,
  isAffirmative,
  chunkIds,
  type ConfirmFn,
  type DeletePass,
  type DeletePassSummary,
  type UpdatePass,
} from "./reconcile/driver.js";
export * from "./reconcile/passes.js";
export { summarizeSources, countByCategory, listNames } from "./reconcile/audit.js";
export { createReporter, type Reporter, type ReporterOutput } from "./reconcile/report.js";
export { createLogger, type Logger } from "./utils/logger.js";
