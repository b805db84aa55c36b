import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Version of the installed tool, read from the nearest package.json above
 * this module. Works from both src/ and the compiled dist/src/ layout.
 */
export async function loadToolVersion(
  startDir = path.dirname(fileURLToPath(import.meta.url)),
): Promise<string> {
  const manifest = await findPackageJson(startDir);
  if (!manifest) {
    return "0.0.0";
  }
  const parsed: unknown = JSON.parse(await fs.readFile(manifest, "utf8"));
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "version" in parsed &&
    typeof parsed.version === "string"
  ) {
    return parsed.version;
  }
  return "0.0.0";
}

async function findPackageJson(startDir: string): Promise<string | undefined> {
  let current = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(current, "package.json");
    if (await existsFile(candidate)) {
      return candidate;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}

async function existsFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}
