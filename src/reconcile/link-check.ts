import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../errors.js";

export const DEFAULT_LINK_TIMEOUT_MS = 5_000;

/** Resolves to why the link is dead, or null when it answered. */
export type LinkCheckFn = (url: string) => Promise<string | null>;

export interface HeadRequestInit {
  method: "HEAD";
  redirect: "follow";
  signal: AbortSignal;
}

export interface LinkCheckerDeps {
  headFn: (url: string, init: HeadRequestInit) => Promise<{ status: number }>;
  existsFn: (filePath: string) => Promise<boolean>;
  rootDir: string;
  timeoutMs: number;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * HTTP links are checked with a HEAD request that follows redirects; a status of 400 or above, a
 * timeout or a network error marks them dead. `/static/...` paths must exist below `rootDir`.
 * Anything else is not checked.
 */
export function createLinkChecker(deps?: Partial<LinkCheckerDeps>): LinkCheckFn {
  const headFn = deps?.headFn ?? ((url: string, init: HeadRequestInit) => fetch(url, init));
  const existsFn = deps?.existsFn ?? fileExists;
  const rootDir = deps?.rootDir ?? process.cwd();
  const timeoutMs = deps?.timeoutMs ?? DEFAULT_LINK_TIMEOUT_MS;

  return async (url) => {
    if (url.startsWith("http")) {
      try {
        const response = await headFn(url, { method: "HEAD", redirect: "follow", signal: AbortSignal.timeout(timeoutMs) });
        return response.status >= 400 ? `Status ${response.status}` : null;
      } catch (error) {
        return errorMessage(error);
      }
    }
    if (url.startsWith("/static/")) {
      return (await existsFn(path.join(rootDir, url.slice(1)))) ? null : "File not found";
    }
    return null;
  };
}
