import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

// Sources run from src/lib, the build from dist/src/lib.
const CANDIDATE_ROOTS = ['../../resources/', '../../../resources/'];

/** Absolute path of a bundled file under `resources/`. */
export function resolveResource(fileName: string): string {
  for (const root of CANDIDATE_ROOTS) {
    const path = fileURLToPath(new URL(`${root}${fileName}`, import.meta.url));
    if (existsSync(path)) {
      return path;
    }
  }
  return fileURLToPath(new URL(`${CANDIDATE_ROOTS[0]}${fileName}`, import.meta.url));
}
