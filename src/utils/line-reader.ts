/**
 * Line-oriented prompt reader over a readable stream.
 */

import { createInterface } from "node:readline";

/**
 * Asks a question and resolves with the next line of input.
 */
export interface PromptReader {
  ask(prompt: string): Promise<string>;
  close(): void;
}

/**
 * Raised when the input stream ends before an answer is read.
 */
export class InputClosedError extends Error {
  constructor(public readonly prompt: string) {
    super(`Input stream closed while waiting for: ${prompt.trim()}`);
    this.name = "InputClosedError";
  }
}

/**
 * Create a prompt reader.
 *
 * Lines are consumed through the interface's async iterator, which buffers
 * them, so piped input that arrives ahead of the prompts is not dropped.
 *
 * @param input - Source of answers (defaults to stdin)
 * @param output - Where prompts are written (defaults to stdout)
 * @returns Prompt reader; call close() when done
 */
export function createLineReader(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): PromptReader {
  const rl = createInterface({ input, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(prompt: string): Promise<string> {
      output.write(prompt);
      const next = await lines.next();
      if (next.done === true) {
        throw new InputClosedError(prompt);
      }
      return next.value;
    },
    close(): void {
      rl.close();
    },
  };
}
