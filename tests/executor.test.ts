import { describe, expect, test } from "vitest";
import { ShellExecutor } from "../src/executor/executor";
import { ExecutionError, UnsafeCommandError } from "../src/errors";

const SHELL = "/bin/sh";

describe("ShellExecutor", () => {
  test("returns stdout of a successful command", async () => {
    const executor = new ShellExecutor({ patterns: [], shell: SHELL });
    expect(await executor.execute("echo 'test'")).toBe("test\n");
  });

  test("runs pipelines through the shell", async () => {
    const executor = new ShellExecutor({ patterns: [], shell: SHELL });
    const output = await executor.execute("printf 'hello\\n' | wc -c");
    expect(output.trim()).toBe("6");
  });

  test("captures stderr together with stdout", async () => {
    const executor = new ShellExecutor({ patterns: [], shell: SHELL });
    expect(await executor.execute("echo 'error message' >&2")).toBe("error message\n");
  });

  test("runs multi-line commands", async () => {
    const executor = new ShellExecutor({ patterns: [], shell: SHELL });
    expect(await executor.execute('echo "line1"\necho "line2"')).toBe("line1\nline2\n");
  });

  test("a failing command rejects with its output and exit code", async () => {
    const executor = new ShellExecutor({ patterns: [], shell: SHELL });
    const error = await executor.execute("echo partial; exit 3").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExecutionError);
    if (error instanceof ExecutionError) {
      expect(error.exitCode).toBe(3);
      expect(error.output).toBe("partial\n");
      expect(error.message).toBe("command execution failed: exit status 3");
    }
  });

  test("an unknown command fails", async () => {
    const executor = new ShellExecutor({ patterns: [], shell: SHELL });
    await expect(executor.execute("nonexistentcommand12345")).rejects.toBeInstanceOf(ExecutionError);
  });

  test("a command that outlives the timeout is killed", async () => {
    const executor = new ShellExecutor({ patterns: [], shell: SHELL, timeoutMs: 100 });
    const started = Date.now();
    const error = await executor.execute("echo started; sleep 2").catch((e: unknown) => e);

    expect(Date.now() - started).toBeLessThan(5000);
    expect(error).toBeInstanceOf(ExecutionError);
    if (error instanceof ExecutionError) {
      expect(error.message).toBe("command execution failed: timed out after 0.1s");
      expect(error.exitCode).toBe(null);
    }
  });

  test("a command that finishes within the timeout succeeds", async () => {
    const executor = new ShellExecutor({ patterns: [], shell: SHELL, timeoutMs: 5000 });
    expect(await executor.execute("echo quick")).toBe("quick\n");
  });

  test("a missing shell binary fails", async () => {
    const executor = new ShellExecutor({ patterns: [], shell: "/nonexistent/shell" });
    const error = await executor.execute("echo hi").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExecutionError);
    expect(error instanceof ExecutionError && error.exitCode).toBe(null);
  });
});

describe("ShellExecutor policy check", () => {
  const patterns = ["echo danger"];

  test("refuses a dangerous command with no approval", async () => {
    const executor = new ShellExecutor({ patterns, shell: SHELL });
    const error = await executor.execute("echo danger zone").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnsafeCommandError);
    if (error instanceof UnsafeCommandError) {
      expect(error.code).toBe("UNSAFE_COMMAND_REFUSED");
      expect(error.message).toBe("refused unsafe command: Command contains dangerous pattern: echo danger");
    }
  });

  test("refuses a dangerous command approved without strict confirmation", () => {
    const executor = new ShellExecutor({ patterns, shell: SHELL });
    expect(() =>
      executor.assertAllowed("echo danger zone", { command: "echo danger zone", strictConfirmed: false })
    ).toThrow(UnsafeCommandError);
  });

  test("refuses when the approval is for a different command", () => {
    const executor = new ShellExecutor({ patterns, shell: SHELL });
    expect(() =>
      executor.assertAllowed("echo danger zone; echo more", { command: "echo danger zone", strictConfirmed: true })
    ).toThrow(UnsafeCommandError);
  });

  test("runs a dangerous command that passed strict confirmation", async () => {
    const executor = new ShellExecutor({ patterns, shell: SHELL });
    const output = await executor.execute("echo danger zone", { command: "echo danger zone", strictConfirmed: true });
    expect(output).toBe("danger zone\n");
  });

  test("safe commands need no approval", () => {
    const executor = new ShellExecutor({ patterns, shell: SHELL });
    expect(() => executor.assertAllowed("echo fine")).not.toThrow();
  });
});
