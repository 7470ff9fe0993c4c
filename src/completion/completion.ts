import { readFile } from 'node:fs/promises';

import type { ResourceCatalog } from '../resources/catalog.js';
import { logger } from '../util/logger.js';
import { ZSH_COMPLETION_PATH } from '../util/paths.js';

export const SUPPORTED_SHELLS = ['zsh'] as const;
export type CompletionShell = (typeof SUPPORTED_SHELLS)[number];

/**
 * Finds `-n NAME`, `--namespace NAME` or `--namespace=NAME` in raw arguments.
 * Completion runs before the namespace resolver, straight off argv.
 */
export function scanNamespaceOverride(argv: readonly string[]): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if ((arg === '-n' || arg === '--namespace') && i + 1 < argv.length) {
      return argv[i + 1];
    }
    if (arg.startsWith('--namespace=')) {
      return arg.slice('--namespace='.length) || undefined;
    }
  }
  return undefined;
}

/**
 * Space-separated namespace names. Lookup failures yield an empty line so the
 * shell simply offers no candidates.
 */
export async function namespaceCompletionLine(catalog: ResourceCatalog): Promise<string> {
  try {
    return (await catalog.namespaceNames()).join(' ');
  } catch (error) {
    logger.warn('Error fetching namespaces', error);
    return '';
  }
}

/** Space-separated pods and failed ReplicaSets, in menu order. */
export async function resourceCompletionLine(catalog: ResourceCatalog, namespace: string): Promise<string> {
  try {
    return (await catalog.selectableResources(namespace)).join(' ');
  } catch (error) {
    logger.warn(`Error fetching pods in ${namespace}`, error);
    return '';
  }
}

export async function readCompletionScript(shell: CompletionShell, scriptPath = ZSH_COMPLETION_PATH): Promise<string> {
  switch (shell) {
    case 'zsh':
      return (await readFile(scriptPath, 'utf8')).trimEnd();
  }
}
