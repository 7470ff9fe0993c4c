import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Get the package root directory.
 * Resolves the same from src/util/ under the test runner and dist/util/ once built.
 */
export function getPackageRoot(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  return path.resolve(__dirname, '../..');
}

export const PACKAGE_ROOT = getPackageRoot();

export const ZSH_COMPLETION_PATH = path.join(PACKAGE_ROOT, 'completions', 'kge.zsh');
