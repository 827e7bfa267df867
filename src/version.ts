/**
 * stepflow version and install location - read dynamically from package.json
 */
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const PACKAGE_NAME = "stepflow";

function findPackageJson(): { version: string; root?: string } {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 10; i++) {
    try {
      const content = readFileSync(join(dir, "package.json"), "utf-8");
      const pkg = JSON.parse(content) as { name?: string; version: string };
      if (pkg.name === PACKAGE_NAME) return { version: pkg.version, root: dir };
    } catch {
      // Not found at this level, go up
    }
    dir = dirname(dir);
  }
  return { version: "0.0.0" };
}

const pkg = findPackageJson();

export const VERSION: string = pkg.version;

/** Directory holding package.json and the bundled templates, if found */
export const PACKAGE_ROOT: string | undefined = pkg.root;
