import type { V1ObjectMeta, V1ReplicaSet } from '@kubernetes/client-node';

import { TtlCache, type Clock } from '../cache/ttlCache.js';
import type { ClusterClient } from '../kube/types.js';
import { logger } from '../util/logger.js';

/** Resource names of one kind in one namespace, as of `fetchedAt` (epoch ms). */
export interface ResourceListing {
  namespace: string;
  names: string[];
  fetchedAt: number;
}

export interface ResourceCatalogOptions {
  ttlSeconds: number;
  clock?: Clock;
}

function namesOf(items: Array<{ metadata?: V1ObjectMeta }>): string[] {
  return items.flatMap((item) => (item.metadata?.name ? [item.metadata.name] : []));
}

/**
 * A ReplicaSet whose controller could not create pods (quota exceeded, admission
 * webhook rejection, missing service account) reports a ReplicaFailure condition.
 * Its events are otherwise hard to find since there is no pod to look at.
 */
export function isFailedReplicaSet(replicaSet: V1ReplicaSet): boolean {
  return (replicaSet.status?.conditions ?? []).some((condition) => condition.type === 'ReplicaFailure');
}

/**
 * Lists the resources a user can pick events for, with short-lived caching so
 * repeated lookups in one session do not hit the API server each time.
 */
export class ResourceCatalog {
  private readonly pods: TtlCache<string, ResourceListing>;
  private readonly failedReplicaSets: TtlCache<string, ResourceListing>;
  private readonly clock: Clock;

  constructor(
    private readonly client: ClusterClient,
    options: ResourceCatalogOptions,
  ) {
    this.clock = options.clock ?? Date.now;
    this.pods = new TtlCache({ ttlSeconds: options.ttlSeconds, clock: this.clock, name: 'pods' });
    this.failedReplicaSets = new TtlCache({
      ttlSeconds: options.ttlSeconds,
      clock: this.clock,
      name: 'failed-replicasets',
    });
  }

  /**
   * @throws QueryError when pods cannot be listed
   */
  async podListing(namespace: string): Promise<ResourceListing> {
    return this.pods.getOrFetch(namespace, async () => {
      const fetchedAt = this.clock();
      const pods = await this.client.listPods(namespace);
      return { namespace, names: namesOf(pods), fetchedAt };
    });
  }

  /**
   * A failed lookup is logged and reported as an empty listing; it is not cached.
   */
  async failedReplicaSetListing(namespace: string): Promise<ResourceListing> {
    try {
      return await this.failedReplicaSets.getOrFetch(namespace, async () => {
        const fetchedAt = this.clock();
        const replicaSets = await this.client.listReplicaSets(namespace);
        return { namespace, names: namesOf(replicaSets.filter(isFailedReplicaSet)), fetchedAt };
      });
    } catch (error) {
      logger.warn('Error fetching ReplicaSets', error);
      return { namespace, names: [], fetchedAt: this.clock() };
    }
  }

  /**
   * Pods first, then failed ReplicaSets, each in API order. Names are not
   * deduplicated across the two kinds.
   */
  async selectableResources(namespace: string): Promise<string[]> {
    const pods = await this.podListing(namespace);
    const failedReplicaSets = await this.failedReplicaSetListing(namespace);
    return [...pods.names, ...failedReplicaSets.names];
  }

  async namespaceNames(): Promise<string[]> {
    return namesOf(await this.client.listNamespaces());
  }
}
