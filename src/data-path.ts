import { fileURLToPath } from 'node:url';

/** Absolute path of a file under the project's data/ directory. */
export function dataFile(name: string): string {
  return fileURLToPath(new URL(`../data/${name}`, import.meta.url));
}
