import { existsSync } from "fs";
import path from "path";

const ROOT_MARKER = path.join("config", "sources.json");

/**
 * Nearest directory above `startDir` holding the bundled source config. Works
 * from src/ under the test runner and from dist/ after a build.
 */
export function projectRoot(startDir: string = __dirname): string {
  let current = startDir;
  for (;;) {
    if (existsSync(path.join(current, ROOT_MARKER))) return current;
    const parent = path.dirname(current);
    if (parent === current) return process.cwd();
    current = parent;
  }
}

export function runManifestPath(outputTxtPath: string): string {
  return path.join(path.dirname(outputTxtPath), "run_manifest.json");
}
