import { createRequire } from "node:module";

const CORE_PACKAGE_NAME = "taskstack";

// src/version.ts and dist/src/version.js sit at different depths
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"] as const;

function readVersionFromPackageJson(moduleUrl: string): string | null {
  const require = createRequire(moduleUrl);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    let parsed: unknown;
    try {
      parsed = require(candidate);
    } catch {
      continue;
    }
    if (typeof parsed !== "object" || parsed === null || !("name" in parsed) || !("version" in parsed)) {
      continue;
    }
    if (parsed.name === CORE_PACKAGE_NAME && typeof parsed.version === "string" && parsed.version.trim()) {
      return parsed.version.trim();
    }
  }
  return null;
}

export const VERSION = readVersionFromPackageJson(import.meta.url) ?? "0.0.0";
