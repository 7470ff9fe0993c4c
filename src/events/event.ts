import type { CoreV1Event } from '@kubernetes/client-node';
import { z } from 'zod';

export const NORMAL_SEVERITY = 'Normal';

export const KubeEventSchema = z.object({
  namespace: z.string(),
  objectName: z.string(),
  objectKind: z.string(),
  objectApiVersion: z.string().optional(),
  reason: z.string(),
  message: z.string(),
  firstSeen: z.date().optional(),
  lastSeen: z.date().optional(),
  /** `Normal`, `Warning`, or whatever a controller chose to write. */
  type: z.string(),
  count: z.number().int().nonnegative(),
});
export type KubeEvent = Readonly<z.infer<typeof KubeEventSchema>>;

export function toDate(value: Date | string | null | undefined): Date | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }

  const date = typeof value === 'string' ? new Date(value) : value;
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Flattens an API event into the fields the CLI shows.
 *
 * Events recorded through events.k8s.io often leave lastTimestamp empty and
 * only set eventTime (or series.lastObservedTime), so those stand in for
 * last-seen.
 */
export function toKubeEvent(event: CoreV1Event, fallbackNamespace = ''): KubeEvent {
  const lastSeen =
    toDate(event.lastTimestamp) ?? toDate(event.series?.lastObservedTime) ?? toDate(event.eventTime);

  return KubeEventSchema.parse({
    namespace: event.metadata.namespace ?? event.involvedObject.namespace ?? fallbackNamespace,
    objectName: event.involvedObject.name ?? '',
    objectKind: event.involvedObject.kind ?? '',
    objectApiVersion: event.involvedObject.apiVersion,
    reason: event.reason ?? '',
    message: event.message ?? '',
    firstSeen: toDate(event.firstTimestamp),
    lastSeen,
    type: event.type ?? 'Unknown',
    count: event.count ?? event.series?.count ?? 1,
  });
}

export function isNormal(event: Pick<KubeEvent, 'type'>): boolean {
  return event.type === NORMAL_SEVERITY;
}
