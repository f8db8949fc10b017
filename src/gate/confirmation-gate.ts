import { classifyCommand } from "../security/classifier";
import type { Verdict } from "../types";
import { InputFailureError, errorMessage } from "../errors";
import { logger } from "../logger";
import {
  STANDARD_PROMPT,
  STRICT_PROMPT,
  formatDangerWarning,
  formatInputFailure,
} from "../ui/terminal";
import type { LineSource } from "./line-source";

export type GateState =
  | "start"
  | "danger-check"
  | "strict-confirm"
  | "standard-confirm"
  | "proceed"
  | "cancelled";

export type ConfirmationDecision =
  | { kind: "proceed" }
  | { kind: "decline"; answer: string }
  | { kind: "input-failure"; cause: InputFailureError };

/** Handed to the executor; it re-checks the command against it. */
export interface ExecutionApproval {
  readonly command: string;
  readonly strictConfirmed: boolean;
}

export type GateOutcome =
  | {
      status: "proceed";
      verdict: Verdict;
      approval: ExecutionApproval;
      trail: GateState[];
    }
  | {
      status: "cancelled";
      verdict: Verdict;
      stage: "strict-confirm" | "standard-confirm";
      decision: Exclude<ConfirmationDecision, { kind: "proceed" }>;
      trail: GateState[];
    };

export interface GateOptions {
  patterns: readonly string[];
  input: LineSource;
  output: { write(chunk: string): unknown };
  colors?: boolean;
}

export function normalizeAnswer(answer: string): string {
  return answer.trim().toLowerCase();
}

/** Dangerous commands need the whole word; no default, no "y". */
export function acceptsStrict(answer: string): boolean {
  return normalizeAnswer(answer) === "yes";
}

/** Bare Enter counts as yes. */
export function acceptsStandard(answer: string): boolean {
  const normalized = normalizeAnswer(answer);
  return normalized === "" || normalized === "y" || normalized === "yes";
}

async function ask(
  prompt: string,
  accept: (answer: string) => boolean,
  options: GateOptions
): Promise<ConfirmationDecision> {
  options.output.write(prompt);

  let answer: string | null;
  try {
    answer = await options.input.readLine();
  } catch (error) {
    return {
      kind: "input-failure",
      cause: new InputFailureError(`read failed: ${errorMessage(error)}`, { cause: error }),
    };
  }

  if (answer === null) {
    return { kind: "input-failure", cause: new InputFailureError("end of input") };
  }
  return accept(answer) ? { kind: "proceed" } : { kind: "decline", answer };
}

/**
 * Walks one command through the confirmation states:
 *
 *   start → danger-check → [strict-confirm] → standard-confirm → proceed | cancelled
 *
 * strict-confirm is entered only for a dangerous verdict and cancels on
 * anything but "yes". standard-confirm always runs. Each prompt reads
 * exactly one line; there is no retry.
 */
export async function runConfirmationGate(command: string, options: GateOptions): Promise<GateOutcome> {
  const tty = options.colors ?? false;
  const trail: GateState[] = [];
  let state: GateState = "start";
  let verdict: Verdict = { dangerous: false };
  let strictConfirmed = false;

  for (;;) {
    trail.push(state);

    switch (state) {
      case "start":
        state = "danger-check";
        break;

      case "danger-check":
        verdict = classifyCommand(command, options.patterns);
        state = verdict.dangerous ? "strict-confirm" : "standard-confirm";
        break;

      case "strict-confirm": {
        if (verdict.dangerous) {
          options.output.write(formatDangerWarning(verdict.reason, tty));
        }
        const decision = await ask(STRICT_PROMPT, acceptsStrict, options);
        if (decision.kind !== "proceed") {
          return cancel(verdict, "strict-confirm", decision, trail, options);
        }
        strictConfirmed = true;
        state = "standard-confirm";
        break;
      }

      case "standard-confirm": {
        const decision = await ask(STANDARD_PROMPT, acceptsStandard, options);
        if (decision.kind !== "proceed") {
          return cancel(verdict, "standard-confirm", decision, trail, options);
        }
        state = "proceed";
        break;
      }

      case "proceed":
        return {
          status: "proceed",
          verdict,
          approval: { command, strictConfirmed },
          trail,
        };
    }
  }
}

function cancel(
  verdict: Verdict,
  stage: "strict-confirm" | "standard-confirm",
  decision: Exclude<ConfirmationDecision, { kind: "proceed" }>,
  trail: GateState[],
  options: GateOptions
): GateOutcome {
  trail.push("cancelled");

  if (decision.kind === "input-failure") {
    logger.info({ stage, err: decision.cause }, "confirmation input failed, treating as decline");
    options.output.write(formatInputFailure(decision.cause.message, options.colors ?? false));
  } else {
    logger.debug({ stage, answer: decision.answer }, "confirmation declined");
  }

  return { status: "cancelled", verdict, stage, decision, trail };
}
