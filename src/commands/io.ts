/**
 * Console and stdin access for commands, injectable for tests.
 */

import readline from 'node:readline';
import { stdin } from 'node:process';
import type { WarnFn } from '../lib/diagnostics.js';

export interface CommandIO {
  /** Lines of standard input, without line terminators */
  readLines(): Promise<string[]>;
  write(text: string): void;
  warn: WarnFn;
}

async function readStdinLines(): Promise<string[]> {
  const rl = readline.createInterface({ input: stdin, crlfDelay: Infinity });
  const lines: string[] = [];
  try {
    for await (const line of rl) {
      lines.push(line);
    }
  } finally {
    rl.close();
  }
  return lines;
}

export const consoleIO: CommandIO = {
  readLines: readStdinLines,
  write: (text) => {
    process.stdout.write(text);
  },
  warn: (message) => console.warn(message),
};
