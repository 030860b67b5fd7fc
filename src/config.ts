import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { VecmendConfig } from "./types.js";

export const MAX_SCAN_CAP = 10_000;
export const DEFAULT_INDEX_NAME = "turf-research";
export const DEFAULT_DIMENSION = 1536;
export const DEFAULT_LABELS_DIR = "static/epa_labels";

const logLevelSchema = z.enum(["info", "warn", "error"]);

const configSchema = z.object({
  index: z.string().trim().min(1).default(DEFAULT_INDEX_NAME),
  namespace: z.string().trim().min(1).optional(),
  dimension: z.number().int().min(1).default(DEFAULT_DIMENSION),
  scanCap: z.number().int().min(1).max(MAX_SCAN_CAP).default(MAX_SCAN_CAP),
  labelsDir: z.string().trim().min(1).default(DEFAULT_LABELS_DIR),
  logLevel: logLevelSchema.default("info"),
});

function resolveUserPath(inputPath: string): string {
  if (!inputPath.startsWith("~")) {
    return inputPath;
  }
  return path.join(os.homedir(), inputPath.slice(1));
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env.VECMEND_CONFIG_PATH?.trim();
  if (explicit) {
    return resolveUserPath(explicit);
  }
  return path.join(os.homedir(), ".vecmend", "config.json");
}

function readConfigFile(configPath: string): unknown {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  try {
    return JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config at '${configPath}' is not valid JSON (${message}).`);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): VecmendConfig {
  const configPath = resolveConfigPath(env);
  const raw = readConfigFile(configPath);
  const fileConfig = raw && typeof raw === "object" && !Array.isArray(raw) ? raw : {};

  const merged: Record<string, unknown> = { ...fileConfig };
  if (env.PINECONE_INDEX?.trim()) {
    merged.index = env.PINECONE_INDEX.trim();
  }
  if (env.PINECONE_NAMESPACE?.trim()) {
    merged.namespace = env.PINECONE_NAMESPACE.trim();
  }
  if (env.VECMEND_LOG_LEVEL?.trim()) {
    merged.logLevel = env.VECMEND_LOG_LEVEL.trim().toLowerCase();
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Config at '${configPath}' is invalid: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function resolveApiKey(env: NodeJS.ProcessEnv = process.env): string | null {
  const key = env.PINECONE_API_KEY?.trim();
  return key ? key : null;
}

export function resolveScanCap(config: VecmendConfig, override?: number): number {
  const cap = override ?? config.scanCap;
  if (!Number.isInteger(cap) || cap < 1 || cap > MAX_SCAN_CAP) {
    throw new ConfigError(`Scan cap must be an integer between 1 and ${MAX_SCAN_CAP}, got: ${cap}`);
  }
  return cap;
}
