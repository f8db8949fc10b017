import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

/**
 * Blocking line input for the confirmation prompts. `readLine` resolves with
 * the next line without its terminator, or `null` once the input is closed.
 * A read error rejects.
 */
export interface LineSource {
  readLine(): Promise<string | null>;
  close(): void;
}

/**
 * One readline interface serves every prompt of a run, so lines that arrive
 * together on a pipe are not dropped between the first and second prompt.
 */
export function createStreamLineSource(input: Readable): LineSource {
  const rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  let failure: Error | undefined;
  input.once("error", (error: Error) => {
    failure = error;
    rl.close();
  });

  return {
    async readLine() {
      const next = await lines.next();
      if (failure) throw failure;
      return next.done ? null : next.value;
    },
    close() {
      rl.close();
    },
  };
}
