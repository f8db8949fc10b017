import type { Config, SystemContext } from "./types";
import { APP_NAME, VERSION } from "./constants";
import { loadConfiguration } from "./config";
import { collectSystemContext } from "./context/collector";
import type { CollectOptions } from "./context/collector";
import { createCommandGenerator } from "./llm/providers";
import type { CommandGenerator } from "./llm/generator";
import { classifyCommand } from "./security/classifier";
import { runConfirmationGate } from "./gate/confirmation-gate";
import { createStreamLineSource } from "./gate/line-source";
import type { LineSource } from "./gate/line-source";
import { ShellExecutor } from "./executor/executor";
import type { CommandExecutor, ExecutorOptions } from "./executor/executor";
import { ExecutionError, UnsafeCommandError, errorMessage } from "./errors";
import { logAudit } from "./audit";
import { logger } from "./logger";
import {
  CANCELLED_MESSAGE,
  formatCommand,
  formatError,
  formatVerdict,
} from "./ui/terminal";

export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface CliDeps {
  stdout: OutputStream;
  stderr: OutputStream;
  openInput: () => LineSource;
  loadConfig: () => Readonly<Config>;
  collectContext: (options: CollectOptions) => Promise<SystemContext>;
  createGenerator: (config: Readonly<Config>) => CommandGenerator;
  createExecutor: (options: ExecutorOptions) => CommandExecutor;
}

export type CliRequest =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "usage-error" }
  | { kind: "check"; command: string }
  | { kind: "query"; query: string; dryRun: boolean };

const defaultDeps: CliDeps = {
  stdout: process.stdout,
  stderr: process.stderr,
  openInput: () => createStreamLineSource(process.stdin),
  loadConfig: () => loadConfiguration(),
  collectContext: collectSystemContext,
  createGenerator: createCommandGenerator,
  createExecutor: (options) => new ShellExecutor(options),
};

/**
 * Flags are read only ahead of the request, so a request that mentions
 * "-h" or "--check" is still passed to the model as written.
 */
export function parseArgs(args: string[]): CliRequest {
  let dryRun = false;
  let i = 0;

  for (; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") return { kind: "help" };
    if (arg === "--version") return { kind: "version" };
    if (arg === "--check") {
      const command = args.slice(i + 1).join(" ");
      return command.trim() ? { kind: "check", command } : { kind: "usage-error" };
    }
    if (arg === "--dry-run") {
      dryRun = true;
      continue;
    }
    if (arg === "--") {
      i++;
    }
    break;
  }

  const query = args.slice(i).join(" ").trim();
  if (!query) return { kind: "usage-error" };
  return { kind: "query", query, dryRun };
}

export function usage(): string {
  return [
    `Usage: ${APP_NAME} [--dry-run] <natural language query>`,
    `       ${APP_NAME} --check <command>`,
    "",
    "Examples:",
    `  ${APP_NAME} list the number of lines in analysis_data.csv`,
    `  ${APP_NAME} find all python files modified in the last week`,
    `  ${APP_NAME} show disk usage sorted by size`,
    "",
    "Options:",
    "  --dry-run        Show the command and its safety verdict without running it",
    "  --check <cmd>    Screen a command against the dangerous patterns (exit 2 if flagged)",
    "  -h, --help       Show this help",
    "  --version        Print the version",
    "",
    "Configuration:",
    "  Default provider: ollama (local), model qwen2.5-coder:7b",
    `  Config file: ~/.config/${APP_NAME}/config.yaml (or $ASKSHELL_CONFIG)`,
    "",
    "  To use Anthropic instead:",
    "    Set ANTHROPIC_API_KEY and ASKSHELL_PROVIDER=anthropic",
    "",
    "  Or in config.yaml:",
    "    provider: ollama  # or anthropic",
    "    model: qwen2.5-coder:7b",
    "    ollama_url: http://localhost:11434",
    "",
  ].join("\n");
}

function handleCheck(command: string, config: Readonly<Config>, deps: CliDeps): number {
  const verdict = classifyCommand(command, config.dangerousPatterns);
  logAudit(command, verdict, "checked");
  if (verdict.dangerous) {
    deps.stderr.write(formatVerdict(verdict.reason, deps.stderr.isTTY ?? false));
    return 2;
  }
  deps.stdout.write(formatVerdict(undefined, deps.stdout.isTTY ?? false));
  return 0;
}

async function handleQuery(query: string, dryRun: boolean, config: Readonly<Config>, deps: CliDeps): Promise<number> {
  const { stdout, stderr } = deps;

  const context = await deps.collectContext({ maxFiles: config.maxContextLines, shell: config.shell });

  let command: string;
  try {
    command = await deps.createGenerator(config).generateCommand(query, context);
  } catch (error) {
    stderr.write(formatError(`generating command: ${errorMessage(error)}`, stderr.isTTY ?? false));
    return 1;
  }

  stdout.write(formatCommand(command, stdout.isTTY ?? false));

  if (dryRun) {
    const verdict = classifyCommand(command, config.dangerousPatterns);
    logAudit(command, verdict, "checked", "dry-run");
    stdout.write(formatVerdict(verdict.dangerous ? verdict.reason : undefined, stdout.isTTY ?? false));
    return 0;
  }

  const input = deps.openInput();
  const outcome = await runConfirmationGate(command, {
    patterns: config.dangerousPatterns,
    input,
    output: stderr,
    colors: stderr.isTTY ?? false,
  }).finally(() => input.close());

  if (outcome.status === "cancelled") {
    logAudit(command, outcome.verdict, "cancelled", `${outcome.stage}: ${outcome.decision.kind}`);
    stdout.write(`${CANCELLED_MESSAGE}\n`);
    return 0;
  }

  logAudit(command, outcome.verdict, outcome.verdict.dangerous ? "approved" : "allowed");

  const executor = deps.createExecutor({
    patterns: config.dangerousPatterns,
    shell: config.shell,
    timeoutMs: config.executionTimeoutSeconds === undefined ? undefined : config.executionTimeoutSeconds * 1000,
  });
  try {
    stdout.write(await executor.execute(command, outcome.approval));
    return 0;
  } catch (error) {
    if (error instanceof UnsafeCommandError) {
      logAudit(command, outcome.verdict, "refused");
    }
    stderr.write(formatError(errorMessage(error), stderr.isTTY ?? false));
    // Whatever the command printed before failing is still worth seeing.
    if (error instanceof ExecutionError && error.output) {
      stdout.write(error.output);
    }
    return 1;
  }
}

export async function run(args: string[], overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = { ...defaultDeps, ...overrides };
  const request = parseArgs(args);

  switch (request.kind) {
    case "help":
      deps.stdout.write(usage());
      return 0;
    case "version":
      deps.stdout.write(`${VERSION}\n`);
      return 0;
    case "usage-error":
      deps.stdout.write(usage());
      return 1;
  }

  let config: Readonly<Config>;
  try {
    config = deps.loadConfig();
  } catch (error) {
    deps.stderr.write(formatError(`loading config: ${errorMessage(error)}`, deps.stderr.isTTY ?? false));
    return 1;
  }

  if (request.kind === "check") {
    return handleCheck(request.command, config, deps);
  }
  return handleQuery(request.query, request.dryRun, config, deps);
}

export async function main(): Promise<void> {
  try {
    process.exit(await run(process.argv.slice(2)));
  } catch (error) {
    logger.error({ err: error }, "unexpected failure");
    process.stderr.write(formatError(errorMessage(error), process.stderr.isTTY));
    process.exit(1);
  }
}
