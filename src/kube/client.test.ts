import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mocks = vi.hoisted(() => ({
  loadFromDefault: vi.fn(),
  getContextObject: vi.fn(),
  listNamespacedPod: vi.fn(),
  listNamespacedEvent: vi.fn(),
  listNamespace: vi.fn(),
  listNamespacedReplicaSet: vi.fn(),
}));

// Mock the @kubernetes/client-node module before importing client
vi.mock('@kubernetes/client-node', () => {
  class CoreV1Api {}
  class AppsV1Api {}

  class MockKubeConfig {
    loadFromDefault = mocks.loadFromDefault;
    loadFromCluster = vi.fn();
    getCurrentContext = vi.fn().mockReturnValue('dev');
    getContextObject = mocks.getContextObject;
    makeApiClient = vi.fn((api: unknown) =>
      api === AppsV1Api
        ? { listNamespacedReplicaSet: mocks.listNamespacedReplicaSet }
        : {
            listNamespacedPod: mocks.listNamespacedPod,
            listNamespacedEvent: mocks.listNamespacedEvent,
            listNamespace: mocks.listNamespace,
          },
    );
  }

  return {
    KubeConfig: MockKubeConfig,
    CoreV1Api,
    AppsV1Api,
  };
});

// Import after mocking
import { createClusterClient, getKubeClients, resetKubeClients } from './client.js';
import { ConnectivityError, QueryError } from '../util/errors.js';

describe('kube client', () => {
  const originalKubeconfig = process.env.KUBECONFIG;

  beforeEach(() => {
    // Reset the cached clients before each test
    resetKubeClients();
    vi.clearAllMocks();
    process.env.KUBECONFIG = '/tmp/kge-test-kubeconfig';
  });

  afterEach(() => {
    resetKubeClients();
    if (originalKubeconfig === undefined) {
      delete process.env.KUBECONFIG;
    } else {
      process.env.KUBECONFIG = originalKubeconfig;
    }
  });

  describe('getKubeClients', () => {
    it('loads the kubeconfig once and reuses the clients', () => {
      const first = getKubeClients();
      const second = getKubeClients();

      expect(first).toBe(second);
      expect(mocks.loadFromDefault).toHaveBeenCalledTimes(1);
    });

    it('raises a ConnectivityError when the kubeconfig cannot be loaded', () => {
      mocks.loadFromDefault.mockImplementationOnce(() => {
        throw new Error('ENOENT: no such file or directory');
      });

      expect(() => getKubeClients()).toThrow(ConnectivityError);
    });
  });

  describe('createClusterClient', () => {
    it('returns pod items for the namespace', async () => {
      mocks.listNamespacedPod.mockResolvedValueOnce({
        items: [{ metadata: { name: 'api-0' } }, { metadata: { name: 'api-1' } }],
      });

      const pods = await createClusterClient().listPods('shop');

      expect(mocks.listNamespacedPod).toHaveBeenCalledWith({ namespace: 'shop' });
      expect(pods.map((pod) => pod.metadata?.name)).toEqual(['api-0', 'api-1']);
    });

    it('passes the field selector through to the events call', async () => {
      mocks.listNamespacedEvent.mockResolvedValueOnce({ items: [] });

      await createClusterClient().listEvents('shop', { fieldSelector: 'involvedObject.name=api-0' });

      expect(mocks.listNamespacedEvent).toHaveBeenCalledWith({
        namespace: 'shop',
        fieldSelector: 'involvedObject.name=api-0',
      });
    });

    it('lists replicasets through the apps API', async () => {
      mocks.listNamespacedReplicaSet.mockResolvedValueOnce({ items: [{ metadata: { name: 'web-7d9' } }] });

      const replicaSets = await createClusterClient().listReplicaSets('shop');

      expect(mocks.listNamespacedReplicaSet).toHaveBeenCalledWith({ namespace: 'shop' });
      expect(replicaSets).toHaveLength(1);
    });

    it('wraps API failures in a QueryError carrying the server message', async () => {
      mocks.listNamespace.mockRejectedValueOnce(
        Object.assign(new Error('HTTP-Code: 403'), {
          code: 403,
          body: JSON.stringify({ message: 'namespaces is forbidden' }),
        }),
      );

      const failure = createClusterClient().listNamespaces();

      await expect(failure).rejects.toBeInstanceOf(QueryError);
      await expect(failure).rejects.toThrow('list namespaces failed: namespaces is forbidden (HTTP 403)');
    });

    it('reads the namespace of the current context', () => {
      mocks.getContextObject.mockReturnValueOnce({ name: 'dev', cluster: 'c', user: 'u', namespace: 'payments' });

      expect(createClusterClient().currentContextNamespace()).toBe('payments');
      expect(mocks.getContextObject).toHaveBeenCalledWith('dev');
    });

    it('returns undefined when the current context is missing', () => {
      mocks.getContextObject.mockReturnValueOnce(null);

      expect(createClusterClient().currentContextNamespace()).toBeUndefined();
    });
  });
});
