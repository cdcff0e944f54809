import { existsSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const MODULE_DIR = path.dirname(fileURLToPath(import.meta.url));

/**
 * Places a bundled `data/<fileName>` may live: the working directory first,
 * then `data/` beside every ancestor of this module. Covers running from
 * `src/` and from the compiled `dist/src/`.
 */
export function dataFileCandidates(
  fileName: string,
  moduleDir: string = MODULE_DIR,
  cwd: string = process.cwd(),
): string[] {
  const candidates = [path.resolve(cwd, "data", fileName)];
  let dir = path.resolve(moduleDir);
  for (;;) {
    candidates.push(path.join(dir, "data", fileName));
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return [...new Set(candidates)];
}

export function findDataFile(
  fileName: string,
  moduleDir: string = MODULE_DIR,
  cwd: string = process.cwd(),
): string | null {
  return dataFileCandidates(fileName, moduleDir, cwd).find((candidate) => existsSync(candidate)) ?? null;
}
