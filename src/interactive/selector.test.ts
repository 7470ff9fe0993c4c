import { Chalk } from 'chalk';
import { describe, expect, it } from 'vitest';

import { createBufferedOutput, createScriptedPrompter } from '../__tests__/terminal.js';
import { buildMenu, parseSelection, renderMenu, selectResource } from './selector.js';

const menu = buildMenu(['web-0', 'web-1', 'worker-9c2']);

describe('buildMenu', () => {
  it('numbers resources from 1 in the given order', () => {
    expect(menu.entries).toEqual([
      { index: 1, name: 'web-0' },
      { index: 2, name: 'web-1' },
      { index: 3, name: 'worker-9c2' },
    ]);
  });
});

describe('renderMenu', () => {
  it('lists the reserved choices around the numbered resources', () => {
    expect(renderMenu(menu, new Chalk({ level: 0 }))).toEqual([
      'Select a pod:',
      '  e) Abnormal events for all pods',
      '  a) All pods, all events',
      '  1) web-0',
      '  2) web-1',
      '  3) worker-9c2',
      '  q) Quit',
    ]);
  });
});

describe('parseSelection', () => {
  it.each(['q', 'Q', ' q '])('treats %j as quit', (input) => {
    expect(parseSelection(input, menu)).toEqual({ kind: 'quit' });
  });

  it('maps a and e to the namespace-wide choices', () => {
    expect(parseSelection('a', menu)).toEqual({ kind: 'all' });
    expect(parseSelection('e', menu)).toEqual({ kind: 'nonNormalAll' });
  });

  it('selects resources by their 1-based index', () => {
    expect(parseSelection('1', menu)).toEqual({ kind: 'single', index: 1, name: 'web-0' });
    expect(parseSelection('3', menu)).toEqual({ kind: 'single', index: 3, name: 'worker-9c2' });
  });

  it.each(['0', '4', '-1'])('rejects out-of-range number %s', (input) => {
    expect(parseSelection(input, menu)).toEqual({
      kind: 'invalid',
      message: 'Invalid selection. Please enter a number between 1 and 3 or q to quit',
    });
  });

  it.each(['', 'web-0', '1.5', 'A', 'all'])('rejects non-numeric input %j', (input) => {
    expect(parseSelection(input, menu)).toEqual({
      kind: 'invalid',
      message: 'Please enter a valid number, a, e or q to quit',
    });
  });
});

describe('selectResource', () => {
  it('re-prompts on invalid input until a valid choice arrives', async () => {
    const prompter = createScriptedPrompter(['0', '4', 'x', '2']);
    const output = createBufferedOutput();

    const selection = await selectResource(menu, prompter, output);

    expect(selection).toEqual({ kind: 'single', index: 2, name: 'web-1' });
    expect(prompter.questions).toEqual([
      'Enter selection: ',
      'Enter selection: ',
      'Enter selection: ',
      'Enter selection: ',
    ]);
    expect(output.lines).toEqual([
      'Invalid selection. Please enter a number between 1 and 3 or q to quit',
      'Invalid selection. Please enter a number between 1 and 3 or q to quit',
      'Please enter a valid number, a, e or q to quit',
    ]);
  });

  it('returns quit for q', async () => {
    await expect(selectResource(menu, createScriptedPrompter(['q']), createBufferedOutput())).resolves.toEqual({
      kind: 'quit',
    });
  });

  it('treats an interrupt as quit', async () => {
    const prompter = createScriptedPrompter(['7']);

    await expect(selectResource(menu, prompter, createBufferedOutput())).resolves.toEqual({ kind: 'quit' });
    expect(prompter.questions).toHaveLength(2);
  });
});
