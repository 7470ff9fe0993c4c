import type { CoreV1Event, V1Namespace, V1Pod, V1ReplicaSet } from '@kubernetes/client-node';

export interface ListOptions {
  fieldSelector?: string;
}

/**
 * The slice of the Kubernetes API the CLI talks to. Every call may reject;
 * callers decide whether a failure is fatal.
 */
export interface ClusterClient {
  listPods(namespace: string, options?: ListOptions): Promise<V1Pod[]>;
  listReplicaSets(namespace: string, options?: ListOptions): Promise<V1ReplicaSet[]>;
  listEvents(namespace: string, options?: ListOptions): Promise<CoreV1Event[]>;
  listNamespaces(options?: ListOptions): Promise<V1Namespace[]>;
  /** Namespace configured on the current kube-config context, if any. May throw. */
  currentContextNamespace(): string | undefined;
}
