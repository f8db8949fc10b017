import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { Config, Provider } from "./types";
import {
  APP_NAME,
  DEFAULT_DANGEROUS_PATTERNS,
  DEFAULT_GENERATION_TIMEOUT_SECONDS,
  DEFAULT_MAX_CONTEXT_LINES,
  DEFAULT_MODELS,
  DEFAULT_OLLAMA_URL,
  DEFAULT_PROVIDER,
  DEFAULT_SHELL,
} from "./constants";
import { ConfigError, errorMessage } from "./errors";
import { readEnv } from "./utils/env";
import { logger } from "./logger";

const ProviderSchema = z.enum(["anthropic", "ollama"]);

const ConfigFileSchema = z.object({
  provider: ProviderSchema.optional(),
  api_key: z.string().optional(),
  model: z.string().min(1).optional(),
  ollama_url: z.string().url().optional(),
  max_context_lines: z.number().int().min(0).optional(),
  dangerous_patterns: z.array(z.string()).optional(),
  generation_timeout_seconds: z.number().positive().optional(),
  execution_timeout_seconds: z.number().positive().optional(),
  shell: z.string().min(1).optional(),
});

type FileConfig = z.infer<typeof ConfigFileSchema>;

export function configDir(): string {
  return join(homedir(), ".config", APP_NAME);
}

export function configPath(): string {
  return readEnv("ASKSHELL_CONFIG") ?? join(configDir(), "config.yaml");
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

export function readConfigFile(path: string): FileConfig {
  if (!existsSync(path)) {
    logger.debug({ path }, "no config file, using defaults");
    return {};
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigError(`failed to parse config file ${path}: ${errorMessage(error)}`, { cause: error });
  }

  // An empty file parses to null.
  if (raw === null || raw === undefined) return {};

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`invalid config at ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function parseProviderValue(raw: string | undefined): Provider | undefined {
  if (!raw) return undefined;
  const parsed = ProviderSchema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(`invalid provider: ${raw} (must be 'anthropic' or 'ollama')`);
  }
  return parsed.data;
}

/**
 * Builds the run's configuration: defaults, then the YAML file, then the
 * environment. The result is frozen and passed down explicitly.
 */
export function loadConfiguration(path = configPath()): Readonly<Config> {
  const fileConfig = readConfigFile(path);

  const provider = parseProviderValue(readEnv("ASKSHELL_PROVIDER")) ?? fileConfig.provider ?? DEFAULT_PROVIDER;
  const apiKey = readEnv("ANTHROPIC_API_KEY") ?? fileConfig.api_key;
  const model = readEnv("ASKSHELL_MODEL") ?? fileConfig.model ?? DEFAULT_MODELS[provider];
  const ollamaUrl = readEnv("OLLAMA_URL") ?? fileConfig.ollama_url ?? DEFAULT_OLLAMA_URL;

  if (provider === "anthropic" && !apiKey) {
    throw new ConfigError(
      "API key is required for Anthropic. Set ANTHROPIC_API_KEY or add api_key to " + path
    );
  }

  const config: Config = {
    provider,
    apiKey,
    model,
    ollamaUrl,
    maxContextLines: fileConfig.max_context_lines ?? DEFAULT_MAX_CONTEXT_LINES,
    dangerousPatterns: Object.freeze([...(fileConfig.dangerous_patterns ?? DEFAULT_DANGEROUS_PATTERNS)]),
    generationTimeoutSeconds: fileConfig.generation_timeout_seconds ?? DEFAULT_GENERATION_TIMEOUT_SECONDS,
    executionTimeoutSeconds: fileConfig.execution_timeout_seconds,
    shell: fileConfig.shell ?? readEnv("SHELL") ?? DEFAULT_SHELL,
  };

  logger.debug({ path, provider, model, patterns: config.dangerousPatterns.length }, "configuration loaded");
  return Object.freeze(config);
}
