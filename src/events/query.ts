import { z } from 'zod';

import type { ClusterClient } from '../kube/types.js';
import { logger } from '../util/logger.js';
import { NORMAL_SEVERITY, toKubeEvent, type KubeEvent } from './event.js';

// Field selector values cannot be quoted, so a comma would split the term
const selectorValue = z
  .string()
  .min(1)
  .regex(/^[^,]+$/, 'must not contain commas');

export const EventFiltersSchema = z.object({
  nonNormalOnly: z.boolean().default(false).describe('Drop events of type Normal'),
  reason: selectorValue.optional().describe('Only events with this reason, e.g. FailedScheduling'),
  kind: selectorValue.optional().describe('Only events whose involved object has this kind'),
  type: selectorValue.optional().describe('Only events of this type, e.g. Warning'),
});

export type EventFilters = z.input<typeof EventFiltersSchema>;

/**
 * Builds the server-side field selector for an event list call: one
 * `field=value` / `field!=value` term per restriction, ANDed with commas.
 * Returns undefined when nothing restricts the query.
 */
export function buildEventFieldSelector(objectName: string | undefined, filters: EventFilters = {}): string | undefined {
  const { nonNormalOnly, reason, kind, type } = EventFiltersSchema.parse(filters);
  const terms: string[] = [];

  if (objectName !== undefined) {
    terms.push(`involvedObject.name=${selectorValue.parse(objectName)}`);
  }
  if (kind) {
    terms.push(`involvedObject.kind=${kind}`);
  }
  if (reason) {
    terms.push(`reason=${reason}`);
  }
  if (type) {
    terms.push(`type=${type}`);
  }
  if (nonNormalOnly) {
    terms.push(`type!=${NORMAL_SEVERITY}`);
  }

  return terms.length > 0 ? terms.join(',') : undefined;
}

async function listEvents(
  client: ClusterClient,
  namespace: string,
  fieldSelector: string | undefined,
): Promise<KubeEvent[]> {
  logger.debug(`Listing events in ${namespace} with selector ${fieldSelector ?? '<none>'}`);
  const events = await client.listEvents(namespace, fieldSelector ? { fieldSelector } : {});
  return events.map((event) => toKubeEvent(event, namespace));
}

/**
 * Events whose involved object is named `resourceName` (a pod or a failed
 * ReplicaSet).
 *
 * @throws QueryError when the API call fails
 */
export async function eventsForPod(
  client: ClusterClient,
  namespace: string,
  resourceName: string,
  filters: EventFilters = {},
): Promise<KubeEvent[]> {
  return listEvents(client, namespace, buildEventFieldSelector(resourceName, filters));
}

/**
 * Every event in the namespace, subject to the same filters.
 *
 * @throws QueryError when the API call fails
 */
export async function eventsForNamespace(
  client: ClusterClient,
  namespace: string,
  filters: EventFilters = {},
): Promise<KubeEvent[]> {
  return listEvents(client, namespace, buildEventFieldSelector(undefined, filters));
}
