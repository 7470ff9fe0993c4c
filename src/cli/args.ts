import chalk from 'chalk';
import yargs from 'yargs';
import { z } from 'zod';

import { SUPPORTED_SHELLS } from '../completion/completion.js';

export const OUTPUT_FORMATS = ['text', 'json'] as const;

export const CliOptionsSchema = z.object({
  pod: z.string().min(1).optional(),
  all: z.boolean(),
  exceptionsOnly: z.boolean(),
  namespace: z.string().min(1).optional(),
  reason: z.string().min(1).optional(),
  kind: z.string().min(1).optional(),
  type: z.string().min(1).optional(),
  showTimestamps: z.boolean(),
  output: z.enum(OUTPUT_FORMATS),
  completePod: z.boolean(),
  completeNs: z.boolean(),
  completion: z.enum(SUPPORTED_SHELLS).optional(),
  version: z.boolean(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

const DESCRIPTION = `View Kubernetes events

Try \`${chalk.cyan('kge -ea')}\` to see all pods with abnormal events
${chalk.cyan('source <(kge --completion zsh)')} to enable zsh completion for pods and namespaces`;

export function createParser(argv: readonly string[]) {
  return yargs([...argv])
    .scriptName('kge')
    .parserConfiguration({ 'parse-positional-numbers': false })
    .usage(`$0 [pod]\n\n${DESCRIPTION}`)
    .version(false)
    .demandCommand(0, 1, '', 'Only one pod name can be given')
    .option('all', { alias: 'a', type: 'boolean', default: false, describe: 'Get events for all pods' })
    .option('namespace', { alias: 'n', type: 'string', describe: 'Specify namespace to use' })
    .option('exceptions-only', {
      alias: 'e',
      type: 'boolean',
      default: false,
      describe: 'Show only non-normal events',
    })
    .option('reason', { alias: 'r', type: 'string', describe: 'Only events with this reason' })
    .option('kind', { alias: 'k', type: 'string', describe: 'Only events for objects of this kind' })
    .option('type', { alias: 't', type: 'string', describe: 'Only events of this type (Normal, Warning)' })
    .option('show-timestamps', {
      type: 'boolean',
      default: false,
      describe: 'Show absolute timestamps instead of relative times',
    })
    .option('output', { alias: 'o', choices: OUTPUT_FORMATS, default: 'text' as const, describe: 'Output format' })
    .option('complete-pod', { type: 'boolean', default: false, hidden: true })
    .option('complete-ns', { type: 'boolean', default: false, hidden: true })
    .option('completion', { choices: SUPPORTED_SHELLS, hidden: true })
    .option('version', { alias: 'v', type: 'boolean', default: false, describe: 'Show version information and exit' })
    .help()
    .alias('help', 'h')
    .strictOptions()
    .wrap(null);
}

/**
 * Parses command-line arguments (without the node and script entries).
 * Prints usage and exits on `--help` or on unknown flags.
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const parsed = createParser(argv).parseSync();
  const [pod] = parsed._;

  return CliOptionsSchema.parse({
    pod: pod === undefined ? undefined : String(pod),
    all: parsed.all,
    exceptionsOnly: parsed['exceptions-only'],
    namespace: parsed.namespace || undefined,
    reason: parsed.reason || undefined,
    kind: parsed.kind || undefined,
    type: parsed.type || undefined,
    showTimestamps: parsed['show-timestamps'],
    output: parsed.output,
    completePod: parsed['complete-pod'],
    completeNs: parsed['complete-ns'],
    completion: parsed.completion,
    version: parsed.version,
  });
}
