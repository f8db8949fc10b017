import { spawn } from "node:child_process";
import { classifyCommand } from "../security/classifier";
import type { ExecutionApproval } from "../gate/confirmation-gate";
import { ExecutionError, UnsafeCommandError, errorMessage } from "../errors";
import { logger } from "../logger";

export interface CommandExecutor {
  execute(command: string, approval?: ExecutionApproval): Promise<string>;
}

export interface ExecutorOptions {
  patterns: readonly string[];
  shell: string;
  /** Kill the command after this long. No limit when unset. */
  timeoutMs?: number;
}

/**
 * Runs approved commands through `<shell> -c`. stdout and stderr are merged
 * in arrival order, the way a terminal would show them.
 */
export class ShellExecutor implements CommandExecutor {
  private readonly patterns: readonly string[];
  private readonly shell: string;
  private readonly timeoutMs?: number;

  constructor(options: ExecutorOptions) {
    this.patterns = options.patterns;
    this.shell = options.shell;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Last line of defence: a dangerous command runs only with an approval for
   * this exact command that passed strict confirmation.
   */
  assertAllowed(command: string, approval?: ExecutionApproval): void {
    const verdict = classifyCommand(command, this.patterns);
    if (!verdict.dangerous) return;
    if (approval && approval.command === command && approval.strictConfirmed) return;

    logger.error({ command, reason: verdict.reason }, "dangerous command reached executor without strict confirmation");
    throw new UnsafeCommandError(verdict.reason);
  }

  async execute(command: string, approval?: ExecutionApproval): Promise<string> {
    this.assertAllowed(command, approval);
    const signal = this.timeoutMs === undefined ? undefined : AbortSignal.timeout(this.timeoutMs);

    return new Promise<string>((resolve, reject) => {
      const chunks: Buffer[] = [];
      const child = spawn(this.shell, ["-c", command], {
        env: process.env,
        stdio: ["ignore", "pipe", "pipe"],
        signal,
      });

      child.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));

      const output = () => Buffer.concat(chunks).toString("utf8");

      child.once("error", (error) => {
        if (signal?.aborted && this.timeoutMs !== undefined) {
          reject(
            new ExecutionError(`command execution failed: timed out after ${this.timeoutMs / 1000}s`, output(), null, {
              cause: error,
            })
          );
          return;
        }
        reject(new ExecutionError(`command execution failed: ${errorMessage(error)}`, output(), null, { cause: error }));
      });

      child.once("close", (code, killedBy) => {
        if (code === 0) {
          logger.debug({ bytes: output().length }, "command finished");
          resolve(output());
          return;
        }
        const status = code === null ? `killed by ${killedBy ?? "signal"}` : `exit status ${code}`;
        reject(new ExecutionError(`command execution failed: ${status}`, output(), code));
      });
    });
  }
}
