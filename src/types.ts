export type Provider = "anthropic" | "ollama";

export interface Config {
  provider: Provider;
  apiKey?: string;
  model: string;
  ollamaUrl: string;
  maxContextLines: number;
  dangerousPatterns: readonly string[];
  generationTimeoutSeconds: number;
  executionTimeoutSeconds?: number;
  shell: string;
}

export interface SystemContext {
  workingDir: string;
  files: string[];
  shell: string;
  os: string;
  arch: string;
}

export type Verdict =
  | { dangerous: false }
  | { dangerous: true; reason: string; pattern: string };

export type AuditDecision = "allowed" | "approved" | "cancelled" | "refused" | "checked";
