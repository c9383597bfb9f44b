/**
 * Locates files that ship beside the sources (prompts, tool catalog).
 * Works both from runtime/src/ and from the compiled dist/runtime/src/.
 */

import { existsSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const PACKAGE_ROOT_CANDIDATES = [
  resolve(__dirname, ".."),
  resolve(__dirname, "../../../runtime"),
];

let packageRoot: string | null = null;

/** Absolute path of `relativePath` under the runtime package root */
export function assetPath(relativePath: string): string {
  if (packageRoot === null) {
    packageRoot = PACKAGE_ROOT_CANDIDATES.find(root => existsSync(resolve(root, "prompts"))) ?? PACKAGE_ROOT_CANDIDATES[0];
  }
  return resolve(packageRoot, relativePath);
}
