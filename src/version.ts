import { createRequire } from "node:module";

const require = createRequire(import.meta.url);

export const APP_VERSION: string = ((): string => {
  try {
    const raw: unknown = require("../package.json");
    if (typeof raw === "object" && raw !== null && "version" in raw) {
      const { version } = raw;
      if (typeof version === "string" && version.trim().length > 0) {
        return version.trim();
      }
    }
  } catch (error) {
    // Bundled or relocated builds have no package.json beside them.
    if (!(error instanceof Error && "code" in error && error.code === "MODULE_NOT_FOUND")) {
      throw error;
    }
  }

  const fromEnv = process.env.npm_package_version;
  if (typeof fromEnv === "string" && fromEnv.trim().length > 0) {
    return fromEnv.trim();
  }

  return "0.0.0";
})();
