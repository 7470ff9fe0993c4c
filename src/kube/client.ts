import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';

import { AppsV1Api, CoreV1Api, KubeConfig } from '@kubernetes/client-node';

import { ConnectivityError, QueryError, describeError } from '../util/errors.js';
import { logger } from '../util/logger.js';
import type { ClusterClient, ListOptions } from './types.js';

export interface KubernetesClientBundle {
  kubeConfig: KubeConfig;
  core: CoreV1Api;
  apps: AppsV1Api;
}

let cachedClients: KubernetesClientBundle | null = null;

function loadKubeConfig(): KubeConfig {
  const kubeConfig = new KubeConfig();
  const kubeconfigEnv = process.env.KUBECONFIG?.split(path.delimiter).filter(Boolean) ?? [];
  const defaultKubeconfigPath = path.join(homedir(), '.kube', 'config');

  try {
    if (kubeconfigEnv.length > 0 || fs.existsSync(defaultKubeconfigPath)) {
      kubeConfig.loadFromDefault();
    } else {
      kubeConfig.loadFromCluster();
    }
  } catch (error) {
    throw new ConnectivityError(`Failed to load kubeconfig: ${describeError(error)}`, { cause: error });
  }

  return kubeConfig;
}

function createClients(): KubernetesClientBundle {
  const kubeConfig = loadKubeConfig();

  return {
    kubeConfig,
    core: kubeConfig.makeApiClient(CoreV1Api),
    apps: kubeConfig.makeApiClient(AppsV1Api),
  };
}

/**
 * @throws ConnectivityError when no kube-config or in-cluster config can be loaded
 */
export function getKubeClients(): KubernetesClientBundle {
  if (!cachedClients) {
    cachedClients = createClients();
  }

  return cachedClients;
}

export function resetKubeClients(): void {
  cachedClients = null;
}

async function query<T>(operation: string, call: () => Promise<T>): Promise<T> {
  logger.debug(`API call: ${operation}`);
  try {
    return await call();
  } catch (error) {
    throw new QueryError(operation, error);
  }
}

/**
 * Builds the ClusterClient backed by the real API server. List failures are
 * rethrown as QueryError with the server's message preserved as the cause.
 */
export function createClusterClient(clients: KubernetesClientBundle = getKubeClients()): ClusterClient {
  const { kubeConfig, core, apps } = clients;

  return {
    async listPods(namespace: string, options: ListOptions = {}) {
      const list = await query(`list pods in namespace "${namespace}"`, () =>
        core.listNamespacedPod({ namespace, ...options }),
      );
      return list.items;
    },

    async listReplicaSets(namespace: string, options: ListOptions = {}) {
      const list = await query(`list replicasets in namespace "${namespace}"`, () =>
        apps.listNamespacedReplicaSet({ namespace, ...options }),
      );
      return list.items;
    },

    async listEvents(namespace: string, options: ListOptions = {}) {
      const list = await query(`list events in namespace "${namespace}"`, () =>
        core.listNamespacedEvent({ namespace, ...options }),
      );
      return list.items;
    },

    async listNamespaces(options: ListOptions = {}) {
      const list = await query('list namespaces', () => core.listNamespace({ ...options }));
      return list.items;
    },

    currentContextNamespace() {
      const context = kubeConfig.getContextObject(kubeConfig.getCurrentContext());
      return context?.namespace;
    },
  };
}
