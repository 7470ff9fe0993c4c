import * as readline from 'node:readline';

/**
 * Line-oriented input. `ask` resolves to null once the user interrupts
 * (Ctrl-C) or input ends (Ctrl-D, closed pipe) and no typed-ahead lines remain.
 */
export interface Prompter {
  ask(question: string): Promise<string | null>;
  close(): void;
}

export function createTerminalPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = readline.createInterface({ input, output });
  // Lines that arrive while no question is pending wait here for the next ask
  const queued: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on('line', (line) => {
    const next = waiting.shift();
    if (next) {
      next(line);
    } else {
      queued.push(line);
    }
  });
  rl.on('SIGINT', () => {
    queued.length = 0;
    rl.close();
  });
  rl.on('close', () => {
    closed = true;
    for (const resolve of waiting.splice(0)) {
      resolve(null);
    }
  });

  return {
    async ask(question) {
      const line = queued.shift();
      if (line !== undefined) {
        return line;
      }
      if (closed) {
        return null;
      }
      rl.setPrompt(question);
      rl.prompt();
      return new Promise<string | null>((resolve) => {
        waiting.push(resolve);
      });
    },
    close() {
      if (!closed) {
        rl.close();
      }
    },
  };
}
