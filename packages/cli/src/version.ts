import { readFileSync } from "node:fs";

const FALLBACK_VERSION = "0.0.0-dev";

/**
 * Where this package's manifest sits relative to this module.
 */
const MANIFEST_CANDIDATES = [
  // packages/cli/src/version.ts, run from source
  "../package.json",
  // dist/cli/src/version.js, emitted by tsconfig.build.json
  "../../../packages/cli/package.json",
];

function versionAt(manifest: URL): string | undefined {
  let pkg: unknown;
  try {
    pkg = JSON.parse(readFileSync(manifest, "utf-8"));
  } catch {
    return undefined;
  }
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return undefined;
}

/**
 * Package version of the CLI, resolved from the location of `moduleUrl`.
 */
export function readVersion(moduleUrl: string | URL = import.meta.url): string {
  for (const candidate of MANIFEST_CANDIDATES) {
    const found = versionAt(new URL(candidate, moduleUrl));
    if (found !== undefined) {
      return found;
    }
  }
  return FALLBACK_VERSION;
}

export const version = readVersion();
