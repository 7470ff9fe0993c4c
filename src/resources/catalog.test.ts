import { describe, expect, it } from 'vitest';

import { createFakeClusterClient } from '../__tests__/fakeClusterClient.js';
import { ResourceCatalog, isFailedReplicaSet } from './catalog.js';

function createClock() {
  let now = 5_000;
  return {
    now: () => now,
    advance(seconds: number) {
      now += seconds * 1000;
    },
  };
}

describe('isFailedReplicaSet', () => {
  it('detects the ReplicaFailure condition', () => {
    expect(
      isFailedReplicaSet({
        status: { replicas: 0, conditions: [{ type: 'ReplicaFailure', status: 'True' }] },
      }),
    ).toBe(true);
  });

  it('ignores replicasets without conditions', () => {
    expect(isFailedReplicaSet({ status: { replicas: 2 } })).toBe(false);
    expect(isFailedReplicaSet({})).toBe(false);
  });
});

describe('ResourceCatalog', () => {
  it('lists pods then failed replicasets, in API order', async () => {
    const client = createFakeClusterClient({
      pods: { shop: ['web-1', 'web-0'] },
      replicaSets: {
        shop: [
          { name: 'web-6f7', failed: false },
          { name: 'worker-9c2', failed: true },
          { name: 'cron-1a2', failed: true },
        ],
      },
    });
    const catalog = new ResourceCatalog(client, { ttlSeconds: 10 });

    await expect(catalog.selectableResources('shop')).resolves.toEqual(['web-1', 'web-0', 'worker-9c2', 'cron-1a2']);
  });

  it('does not deduplicate names shared by a pod and a replicaset', async () => {
    const client = createFakeClusterClient({
      pods: { shop: ['web'] },
      replicaSets: { shop: [{ name: 'web', failed: true }] },
    });
    const catalog = new ResourceCatalog(client, { ttlSeconds: 10 });

    await expect(catalog.selectableResources('shop')).resolves.toEqual(['web', 'web']);
  });

  it('caches both listings per namespace for the TTL', async () => {
    const clock = createClock();
    const client = createFakeClusterClient({ pods: { shop: ['web-0'] } });
    const catalog = new ResourceCatalog(client, { ttlSeconds: 10, clock: clock.now });

    await catalog.selectableResources('shop');
    clock.advance(5);
    await catalog.selectableResources('shop');
    expect(client.listPods).toHaveBeenCalledTimes(1);
    expect(client.listReplicaSets).toHaveBeenCalledTimes(1);

    await catalog.selectableResources('ops');
    expect(client.listPods).toHaveBeenCalledTimes(2);

    clock.advance(5);
    await catalog.selectableResources('shop');
    expect(client.listPods).toHaveBeenCalledTimes(3);
    expect(client.listReplicaSets).toHaveBeenCalledTimes(3);
  });

  it('records when a listing was fetched', async () => {
    const clock = createClock();
    const catalog = new ResourceCatalog(createFakeClusterClient({ pods: { shop: ['web-0'] } }), {
      ttlSeconds: 10,
      clock: clock.now,
    });

    await expect(catalog.podListing('shop')).resolves.toEqual({
      namespace: 'shop',
      names: ['web-0'],
      fetchedAt: 5_000,
    });
  });

  it('treats a failed replicaset lookup as an empty list', async () => {
    const client = createFakeClusterClient({ pods: { shop: ['web-0'] } });
    client.listReplicaSets.mockRejectedValueOnce(new Error('replicasets.apps is forbidden'));
    const catalog = new ResourceCatalog(client, { ttlSeconds: 10 });

    await expect(catalog.selectableResources('shop')).resolves.toEqual(['web-0']);

    // The failure is not cached
    await catalog.failedReplicaSetListing('shop');
    expect(client.listReplicaSets).toHaveBeenCalledTimes(2);
  });

  it('propagates pod lookup failures', async () => {
    const client = createFakeClusterClient();
    client.listPods.mockRejectedValueOnce(new Error('pods is forbidden'));
    const catalog = new ResourceCatalog(client, { ttlSeconds: 10 });

    await expect(catalog.selectableResources('shop')).rejects.toThrow('pods is forbidden');
    expect(client.listReplicaSets).not.toHaveBeenCalled();
  });

  it('lists namespace names', async () => {
    const catalog = new ResourceCatalog(createFakeClusterClient({ namespaces: ['default', 'kube-system'] }), {
      ttlSeconds: 10,
    });

    await expect(catalog.namespaceNames()).resolves.toEqual(['default', 'kube-system']);
  });
});
