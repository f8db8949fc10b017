import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import type { MessageContent } from "@langchain/core/messages";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { SystemContext } from "../types";
import { GenerationError, errorMessage } from "../errors";
import { logger } from "../logger";
import { buildSystemPrompt, parseCommandFromResponse } from "./prompt";

export interface CommandGenerator {
  generateCommand(query: string, context: SystemContext): Promise<string>;
}

function contentText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

/**
 * Settles with `promise`, or rejects with the signal's reason as soon as it
 * aborts, whether or not the work behind `promise` watches the signal.
 */
export function raceWithAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Asks a chat model for one command. The request is abandoned once
 * `timeoutMs` has passed.
 */
export class ChatCommandGenerator implements CommandGenerator {
  constructor(
    private readonly model: BaseChatModel,
    private readonly timeoutMs: number
  ) {}

  async generateCommand(query: string, context: SystemContext): Promise<string> {
    const signal = AbortSignal.timeout(this.timeoutMs);
    const messages = [new SystemMessage(buildSystemPrompt(context)), new HumanMessage(query)];

    const started = Date.now();
    let text: string;
    try {
      const reply = await raceWithAbort(this.model.invoke(messages, { signal }), signal);
      text = contentText(reply.content);
    } catch (error) {
      if (signal.aborted) {
        throw new GenerationError(`model did not answer within ${this.timeoutMs / 1000}s`, { cause: error });
      }
      throw new GenerationError(`model request failed: ${errorMessage(error)}`, { cause: error });
    }
    logger.debug({ elapsedMs: Date.now() - started, chars: text.length }, "model replied");

    return parseCommandFromResponse(text);
  }
}
