/**
 * Line-oriented terminal I/O on top of readline
 *
 * Lines are queued as they arrive and handed to prompts in order.
 */

import * as readline from 'node:readline';

export interface Terminal {
  /** Resolves with the trimmed answer, or null once input is closed */
  ask(prompt: string): Promise<string | null>;
  print(line?: string): void;
  close(): void;
}

export function createTerminal(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): Terminal {
  const rl = readline.createInterface({ input, terminal: false });
  const buffered: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on('line', (line) => {
    const next = waiting.shift();
    if (next) {
      next(line.trim());
    } else {
      buffered.push(line.trim());
    }
  });

  rl.on('close', () => {
    closed = true;
    for (const resolve of waiting.splice(0)) {
      resolve(null);
    }
  });

  return {
    ask(prompt) {
      output.write(prompt);
      const line = buffered.shift();
      if (line !== undefined) {
        return Promise.resolve(line);
      }
      if (closed) {
        return Promise.resolve(null);
      }
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    print(line = '') {
      output.write(`${line}\n`);
    },
    close() {
      rl.close();
    },
  };
}
