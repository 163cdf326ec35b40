/**
 * Scripted stand-in for the terminal prompt reader.
 */

import {
  InputClosedError,
  type PromptReader,
} from "../../src/utils/line-reader.js";

export interface ScriptedReader extends PromptReader {
  /** Every prompt asked, in order */
  readonly prompts: string[];
  closed: boolean;
}

/**
 * Create a reader that answers prompts from a fixed script. Once the
 * script runs out, ask() rejects with InputClosedError, as the real
 * reader does when stdin ends.
 *
 * @param answers - Answers in the order they will be given
 */
export function createScriptedReader(
  answers: readonly string[],
): ScriptedReader {
  const queue = [...answers];
  const prompts: string[] = [];

  const reader: ScriptedReader = {
    prompts,
    closed: false,
    ask(prompt: string): Promise<string> {
      prompts.push(prompt);
      const next = queue.shift();
      if (next === undefined) {
        return Promise.reject(new InputClosedError(prompt));
      }
      return Promise.resolve(next);
    },
    close(): void {
      reader.closed = true;
    },
  };

  return reader;
}
