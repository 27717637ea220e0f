import { existsSync } from "fs";
import { dirname, resolve } from "path";

/**
 * Walks up from `startDir` to the nearest directory holding `marker`
 * (package.json by default). Compiled code under dist/ and sources under
 * src/ both use it to find config/ beside the package manifest.
 */
export function findPackageRoot(
  startDir: string,
  marker: string = "package.json",
  maxDepth: number = 10,
): string {
  let dir = resolve(startDir);
  for (let depth = 0; depth < maxDepth; depth++) {
    if (existsSync(resolve(dir, marker))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return resolve(startDir);
}
