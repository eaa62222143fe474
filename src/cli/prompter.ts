/**
 * Line-based terminal input.
 *
 * The interactive flow reads answers through a Prompter so tests can replay
 * scripted answers without a TTY.
 */

import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export function createConsolePrompter(): Prompter {
  const rl = createInterface({ input: stdin, output: stdout });
  return {
    ask: (question) => rl.question(question),
    close: () => rl.close(),
  };
}
