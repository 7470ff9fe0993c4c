import { describeError } from '../util/errors.js';
import { logger } from '../util/logger.js';

export const DEFAULT_NAMESPACE = 'default';

/** Reads the namespace of the active kube-context; may throw or return nothing. */
export type ContextNamespaceLookup = () => string | undefined | null;

/**
 * Picks the namespace a command runs against: an explicit `-n` wins, then the
 * current kube-context's namespace, then "default". The context lookup runs at
 * most once per resolver, so one resolver per process gives a stable answer
 * even if the kube-config changes mid-run.
 */
export class NamespaceResolver {
  private contextNamespace: string | undefined;

  constructor(private readonly lookupContextNamespace: ContextNamespaceLookup) {}

  resolve(explicitNamespace?: string | null): string {
    if (explicitNamespace) {
      return explicitNamespace;
    }

    if (this.contextNamespace === undefined) {
      this.contextNamespace = this.readContextNamespace();
    }

    return this.contextNamespace;
  }

  private readContextNamespace(): string {
    try {
      const namespace = this.lookupContextNamespace();
      if (namespace) {
        return namespace;
      }
    } catch (error) {
      logger.debug(`Could not read namespace from kube-context, using "${DEFAULT_NAMESPACE}": ${describeError(error)}`);
    }

    return DEFAULT_NAMESPACE;
  }
}
