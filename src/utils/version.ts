import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";

import { z } from "zod";

const manifestSchema = z.object({ version: z.string().trim().min(1) });

let cachedVersion: string | undefined;

export function getCliVersion(): string {
  cachedVersion ??= readManifestVersion(findManifest(__dirname)) ?? "unknown";
  return cachedVersion;
}

function findManifest(start: string): string | undefined {
  for (let directory = start; ; directory = dirname(directory)) {
    const candidate = join(directory, "package.json");
    if (existsSync(candidate)) {
      return candidate;
    }
    if (dirname(directory) === directory) {
      return undefined;
    }
  }
}

function readManifestVersion(path: string | undefined): string | undefined {
  if (!path) {
    return undefined;
  }

  let manifest: unknown;
  try {
    manifest = JSON.parse(readFileSync(path, "utf8"));
  } catch {
    // An unreadable manifest reports "unknown" rather than failing --version.
    return undefined;
  }

  const result = manifestSchema.safeParse(manifest);
  return result.success ? result.data.version : undefined;
}
