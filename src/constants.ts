export const APP_NAME = "askshell";
export const VERSION = "0.1.0";

export const DEFAULT_DANGEROUS_PATTERNS: readonly string[] = Object.freeze([
  // Recursive deletes of root, cwd or home
  "rm -rf /", "rm -rf /*", "rm -rf *", "rm -rf ~", "rm -rf $HOME",
  // Raw disk writes and formatting
  "> /dev/sda", "dd if=", "mkfs", "format", "diskutil",
  // fork bomb
  ":(){:|:&};:",
  "chmod -R 777 /",
  // Piping into a shell
  "| sh", "| bash", "| zsh",
]);

export const DEFAULT_PROVIDER = "ollama";
export const DEFAULT_MODELS = {
  ollama: "qwen2.5-coder:7b",
  anthropic: "claude-3-5-sonnet-latest",
} as const;
export const DEFAULT_OLLAMA_URL = "http://localhost:11434";
export const DEFAULT_MAX_CONTEXT_LINES = 20;
export const DEFAULT_GENERATION_TIMEOUT_SECONDS = 30;
export const DEFAULT_SHELL = "/bin/sh";
export const ANTHROPIC_MAX_TOKENS = 1024;

export const DANGER_REASON_PREFIX = "Command contains dangerous pattern: ";
