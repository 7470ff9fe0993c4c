import type { ChalkInstance } from 'chalk';
import { z } from 'zod';

import { isNormal, type KubeEvent } from './event.js';

export const NO_EVENTS_FOUND = 'No events found';
export const UNKNOWN_TIME = 'unknown time';

const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_HOUR = 60 * SECONDS_PER_MINUTE;
const SECONDS_PER_DAY = 24 * SECONDS_PER_HOUR;

export type Emphasis = 'affirmative' | 'warning';

export type DisplayLine =
  | {
      kind: 'event';
      time: string;
      severity: string;
      emphasis: Emphasis;
      object: string;
      reason: string;
      message: string;
      count: number;
    }
  | { kind: 'empty'; text: string };

export interface FormatOptions {
  /** Reference instant for relative times. */
  now?: Date;
  /** Print ISO timestamps instead of "5m ago". */
  absolute?: boolean;
}

/**
 * Oldest first by last-seen time. Events without one go last, keeping their
 * relative order.
 */
export function sortEvents(events: readonly KubeEvent[]): KubeEvent[] {
  return [...events].sort((a, b) => {
    if (!a.lastSeen || !b.lastSeen) {
      return Number(!a.lastSeen) - Number(!b.lastSeen);
    }
    return a.lastSeen.getTime() - b.lastSeen.getTime();
  });
}

export function formatRelativeTime(timestamp: Date, now: Date): string {
  const elapsed = Math.max(0, Math.floor((now.getTime() - timestamp.getTime()) / 1000));

  if (elapsed >= SECONDS_PER_DAY) {
    return `${Math.floor(elapsed / SECONDS_PER_DAY)}d ago`;
  }
  if (elapsed >= SECONDS_PER_HOUR) {
    return `${Math.floor(elapsed / SECONDS_PER_HOUR)}h ago`;
  }
  if (elapsed >= SECONDS_PER_MINUTE) {
    return `${Math.floor(elapsed / SECONDS_PER_MINUTE)}m ago`;
  }
  return `${elapsed}s ago`;
}

export function formatEventTime(event: KubeEvent, options: FormatOptions = {}): string {
  if (!event.lastSeen) {
    return UNKNOWN_TIME;
  }
  if (options.absolute) {
    return event.lastSeen.toISOString();
  }
  return formatRelativeTime(event.lastSeen, options.now ?? new Date());
}

export function formatEvents(events: readonly KubeEvent[], options: FormatOptions = {}): DisplayLine[] {
  if (events.length === 0) {
    return [{ kind: 'empty', text: NO_EVENTS_FOUND }];
  }

  const now = options.now ?? new Date();
  return sortEvents(events).map(
    (event): DisplayLine => ({
      kind: 'event',
      time: formatEventTime(event, { ...options, now }),
      severity: event.type,
      emphasis: isNormal(event) ? 'affirmative' : 'warning',
      object: event.objectKind ? `${event.objectKind}/${event.objectName}` : event.objectName,
      reason: event.reason,
      message: event.message,
      count: event.count,
    }),
  );
}

export function renderLine(line: DisplayLine, chalk: ChalkInstance): string {
  switch (line.kind) {
    case 'empty':
      return chalk.yellow(line.text);
    case 'event': {
      const severity = line.emphasis === 'affirmative' ? chalk.green(line.severity) : chalk.red(line.severity);
      const repeats = line.count > 1 ? chalk.dim(` (x${line.count})`) : '';
      return `${chalk.cyan(line.time)} ${severity} ${line.object} ${chalk.yellow(line.reason)}: ${line.message}${repeats}`;
    }
  }
}

export function renderEvents(events: readonly KubeEvent[], chalk: ChalkInstance, options: FormatOptions = {}): string {
  return formatEvents(events, options)
    .map((line) => renderLine(line, chalk))
    .join('\n');
}

export const EventRowSchema = z.object({
  lastSeen: z.string().datetime().nullable(),
  firstSeen: z.string().datetime().nullable(),
  type: z.string(),
  reason: z.string(),
  kind: z.string(),
  name: z.string(),
  namespace: z.string(),
  apiVersion: z.string().nullable(),
  message: z.string(),
  count: z.number().int().nonnegative(),
});
export type EventRow = z.infer<typeof EventRowSchema>;

/**
 * Structured form used by `--output json`, sorted like the text output.
 *
 * @throws ZodError when an event does not fit the row schema
 */
export function toEventRows(events: readonly KubeEvent[]): EventRow[] {
  const rows = sortEvents(events).map((event) => ({
    lastSeen: event.lastSeen?.toISOString() ?? null,
    firstSeen: event.firstSeen?.toISOString() ?? null,
    type: event.type,
    reason: event.reason,
    kind: event.objectKind,
    name: event.objectName,
    namespace: event.namespace,
    apiVersion: event.objectApiVersion ?? null,
    message: event.message,
    count: event.count,
  }));
  return EventRowSchema.array().parse(rows);
}
