import type { ChalkInstance } from 'chalk';

import type { Clock } from './cache/ttlCache.js';
import type { CliOptions } from './cli/args.js';
import {
  namespaceCompletionLine,
  readCompletionScript,
  resourceCompletionLine,
  scanNamespaceOverride,
} from './completion/completion.js';
import type { KgeConfig } from './config.js';
import type { KubeEvent } from './events/event.js';
import { renderEvents, toEventRows } from './events/format.js';
import { EventFiltersSchema, eventsForNamespace, eventsForPod, type EventFilters } from './events/query.js';
import type { Prompter } from './interactive/prompter.js';
import { buildMenu, renderMenu, selectResource, type Selection } from './interactive/selector.js';
import { NamespaceResolver } from './kube/namespace.js';
import type { ClusterClient } from './kube/types.js';
import { ResourceCatalog } from './resources/catalog.js';
import { describeError } from './util/errors.js';
import { logger } from './util/logger.js';
import type { Output } from './util/output.js';
import { VERSION } from './version.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

const RULE = '-'.repeat(40);

export interface AppDependencies {
  /** Builds the API client; throws ConnectivityError when no config is usable. */
  createClient: () => ClusterClient;
  createPrompter: () => Prompter;
  output: Output;
  chalk: ChalkInstance;
  config: KgeConfig;
  /** Unparsed arguments, scanned directly for completion requests. */
  rawArgs: readonly string[];
  /** Reference time for relative timestamps. */
  now?: () => Date;
  /** Clock for the listing caches. */
  clock?: Clock;
}

interface Session {
  client: ClusterClient;
  catalog: ResourceCatalog;
  namespace: string;
  filters: EventFilters;
}

/**
 * Runs one kge invocation and returns its exit status. Nothing here calls
 * process.exit; the entry point does that with the returned code.
 */
export async function run(options: CliOptions, deps: AppDependencies): Promise<number> {
  const { output, chalk } = deps;

  if (options.version) {
    output.print(`kge ${VERSION}`);
    return EXIT_SUCCESS;
  }

  if (options.completion) {
    output.print(await readCompletionScript(options.completion));
    return EXIT_SUCCESS;
  }

  const client = connect(deps);
  if (!client) {
    return EXIT_FAILURE;
  }

  const resolver = new NamespaceResolver(() => client.currentContextNamespace());
  const catalog = new ResourceCatalog(client, { ttlSeconds: deps.config.cacheTtlSeconds, clock: deps.clock });

  // Completion feeds print exactly one line and nothing else
  if (options.completePod) {
    const namespace = scanNamespaceOverride(deps.rawArgs) ?? resolver.resolve();
    output.print(await resourceCompletionLine(catalog, namespace));
    return EXIT_SUCCESS;
  }
  if (options.completeNs) {
    output.print(await namespaceCompletionLine(catalog));
    return EXIT_SUCCESS;
  }

  const filters = EventFiltersSchema.safeParse({
    nonNormalOnly: options.exceptionsOnly,
    reason: options.reason,
    kind: options.kind,
    type: options.type,
  });
  if (!filters.success) {
    output.print(chalk.red(`Invalid event filter: ${describeError(filters.error)}`));
    return EXIT_FAILURE;
  }

  const session: Session = {
    client,
    catalog,
    namespace: resolver.resolve(options.namespace),
    filters: filters.data,
  };
  logger.debug(`Resolved namespace ${session.namespace}`);
  banner(options, deps, `Using namespace: ${session.namespace}`);

  if (options.pod) {
    const pod = options.pod;
    return showEvents(options, deps, `Getting events for pod: ${pod}`, () =>
      eventsForPod(client, session.namespace, pod, session.filters),
    );
  }

  if (options.all) {
    return showEvents(options, deps, 'Getting events for all pods', () =>
      eventsForNamespace(client, session.namespace, session.filters),
    );
  }

  return runInteractive(options, deps, session);
}

function connect(deps: AppDependencies): ClusterClient | undefined {
  try {
    return deps.createClient();
  } catch (error) {
    deps.output.print(deps.chalk.red(`Error connecting to Kubernetes: ${describeError(error)}`));
    return undefined;
  }
}

async function runInteractive(options: CliOptions, deps: AppDependencies, session: Session): Promise<number> {
  const { output, chalk } = deps;

  banner(options, deps, 'Fetching pods...');
  let resources: string[];
  try {
    resources = await session.catalog.selectableResources(session.namespace);
  } catch (error) {
    output.print(chalk.red(`Error fetching pods: ${describeError(error)}`));
    return EXIT_FAILURE;
  }

  if (resources.length === 0) {
    output.print(chalk.yellow(`No pods found in namespace ${session.namespace}`));
    return EXIT_FAILURE;
  }

  const menu = buildMenu(resources);
  for (const line of renderMenu(menu, chalk)) {
    output.print(line);
  }

  const prompter = deps.createPrompter();
  let selection: Selection;
  try {
    selection = await selectResource(menu, prompter, output);
  } finally {
    prompter.close();
  }

  return dispatch(selection, options, deps, session);
}

async function dispatch(
  selection: Selection,
  options: CliOptions,
  deps: AppDependencies,
  session: Session,
): Promise<number> {
  const { client, namespace, filters } = session;

  switch (selection.kind) {
    case 'quit':
      deps.output.print('\nExiting gracefully...');
      return EXIT_SUCCESS;
    case 'nonNormalAll':
      return showEvents(options, deps, '\nGetting non-normal events for all pods', () =>
        eventsForNamespace(client, namespace, { ...filters, nonNormalOnly: true }),
      );
    case 'all':
      return showEvents(options, deps, '\nGetting events for all pods', () =>
        eventsForNamespace(client, namespace, filters),
      );
    case 'single': {
      const { name } = selection;
      return showEvents(options, deps, `\nGetting events for pod: ${name}`, () =>
        eventsForPod(client, namespace, name, filters),
      );
    }
    default: {
      const unreachable: never = selection;
      throw new Error(`Unhandled selection ${JSON.stringify(unreachable)}`);
    }
  }
}

function banner(options: CliOptions, deps: AppDependencies, text: string): void {
  if (options.output === 'text') {
    deps.output.print(deps.chalk.cyan(text));
  }
}

async function showEvents(
  options: CliOptions,
  deps: AppDependencies,
  heading: string,
  query: () => Promise<KubeEvent[]>,
): Promise<number> {
  const { output, chalk } = deps;

  banner(options, deps, heading);
  banner(options, deps, RULE);

  let events: KubeEvent[];
  try {
    events = await query();
  } catch (error) {
    output.print(chalk.red(`Error getting events: ${describeError(error)}`));
    return EXIT_FAILURE;
  }

  if (options.output === 'json') {
    output.print(JSON.stringify(toEventRows(events), null, 2));
  } else {
    output.print(
      renderEvents(events, chalk, { now: deps.now?.() ?? new Date(), absolute: options.showTimestamps }),
    );
  }
  return EXIT_SUCCESS;
}
