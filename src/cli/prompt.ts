import { createInterface } from 'readline/promises';
import type { OperatorSignal } from '../gallery/types.js';

/**
 * Prompt on the terminal and resolve once the operator presses Enter
 *
 * While the prompt is open readline owns Ctrl-C, so it is forwarded to
 * onInterrupt instead of reaching the process SIGINT handler.
 */
export function createEnterPrompt(
  onInterrupt: () => void,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): OperatorSignal {
  return async (message, signal) => {
    signal?.throwIfAborted();
    const rl = createInterface({ input, output });
    rl.on('SIGINT', onInterrupt);

    try {
      await rl.question(message, signal ? { signal } : {});
    } finally {
      rl.close();
    }
  };
}
