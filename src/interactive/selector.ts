import type { ChalkInstance } from 'chalk';

import type { Output } from '../util/output.js';
import type { Prompter } from './prompter.js';

export const PROMPT = 'Enter selection: ';

export interface MenuEntry {
  /** 1-based, as typed by the user. */
  index: number;
  name: string;
}

export interface SelectionMenu {
  entries: MenuEntry[];
}

export type Selection =
  | { kind: 'all' }
  | { kind: 'nonNormalAll' }
  | { kind: 'single'; index: number; name: string }
  | { kind: 'quit' };

export type SelectionInput = Selection | { kind: 'invalid'; message: string };

export function buildMenu(resourceNames: readonly string[]): SelectionMenu {
  return { entries: resourceNames.map((name, i) => ({ index: i + 1, name })) };
}

export function renderMenu(menu: SelectionMenu, chalk: ChalkInstance): string[] {
  return [
    chalk.cyan('Select a pod:'),
    `  ${chalk.green('e')}) Abnormal events for all pods`,
    `  ${chalk.green('a')}) All pods, all events`,
    ...menu.entries.map((entry) => `${chalk.green(String(entry.index).padStart(3))}) ${entry.name}`),
    `  ${chalk.green('q')}) Quit`,
  ];
}

/**
 * Interprets one line of menu input. `q` is case-insensitive; `a` and `e`
 * are not. Numbers must fall within the menu.
 */
export function parseSelection(input: string, menu: SelectionMenu): SelectionInput {
  const value = input.trim();
  const size = menu.entries.length;

  if (value.toLowerCase() === 'q') {
    return { kind: 'quit' };
  }
  if (value === 'a') {
    return { kind: 'all' };
  }
  if (value === 'e') {
    return { kind: 'nonNormalAll' };
  }

  if (!/^[+-]?\d+$/.test(value)) {
    return { kind: 'invalid', message: 'Please enter a valid number, a, e or q to quit' };
  }

  const index = Number.parseInt(value, 10);
  const entry = menu.entries[index - 1];
  if (index < 1 || index > size || !entry) {
    return {
      kind: 'invalid',
      message: `Invalid selection. Please enter a number between 1 and ${size} or q to quit`,
    };
  }

  return { kind: 'single', index, name: entry.name };
}

/**
 * Prompts until the user makes a valid choice. Invalid input is reported and
 * asked again; an interrupt or end of input counts as quitting.
 */
export async function selectResource(menu: SelectionMenu, prompter: Prompter, output: Output): Promise<Selection> {
  for (;;) {
    const answer = await prompter.ask(PROMPT);
    if (answer === null) {
      return { kind: 'quit' };
    }

    const selection = parseSelection(answer, menu);
    if (selection.kind !== 'invalid') {
      return selection;
    }
    output.print(selection.message);
  }
}
