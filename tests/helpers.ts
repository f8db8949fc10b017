import type { LineSource } from "../src/gate/line-source";

export type ScriptedLine = string | null | Error;

export interface ScriptedInput extends LineSource {
  reads: number;
  closed: boolean;
}

/** Answers prompts from a fixed script; runs past the end as end-of-input. */
export function scriptedInput(lines: ScriptedLine[]): ScriptedInput {
  const queue = [...lines];
  const source: ScriptedInput = {
    reads: 0,
    closed: false,
    async readLine() {
      source.reads++;
      const next = queue.shift();
      if (next instanceof Error) throw next;
      return next ?? null;
    },
    close() {
      source.closed = true;
    },
  };
  return source;
}

export interface CapturedOutput {
  text: string;
  isTTY: boolean;
  write(chunk: string): boolean;
}

export function captureOutput(): CapturedOutput {
  const out: CapturedOutput = {
    text: "",
    isTTY: false,
    write(chunk: string) {
      out.text += chunk;
      return true;
    },
  };
  return out;
}
