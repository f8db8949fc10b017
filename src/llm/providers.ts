import { ChatAnthropic } from "@langchain/anthropic";
import { ChatOllama } from "@langchain/ollama";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { Config } from "../types";
import { ANTHROPIC_MAX_TOKENS } from "../constants";
import { ChatCommandGenerator } from "./generator";
import type { CommandGenerator } from "./generator";

export function createChatModel(config: Readonly<Config>): BaseChatModel {
  switch (config.provider) {
    case "anthropic":
      return new ChatAnthropic({
        apiKey: config.apiKey,
        model: config.model,
        maxTokens: ANTHROPIC_MAX_TOKENS,
      });
    case "ollama":
      return new ChatOllama({
        baseUrl: config.ollamaUrl,
        model: config.model,
      });
  }
}

export function createCommandGenerator(config: Readonly<Config>): CommandGenerator {
  return new ChatCommandGenerator(createChatModel(config), config.generationTimeoutSeconds * 1000);
}
