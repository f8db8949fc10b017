const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";

export const STRICT_PROMPT = "Are you SURE you want to execute this? Type the full word 'yes' or 'no' [yes/no]: ";
export const STANDARD_PROMPT = "Execute? [Y/n]: ";
export const CANCELLED_MESSAGE = "Command execution cancelled.";

function paint(text: string, color: string, tty: boolean): string {
  return tty ? `${color}${text}${RESET}` : text;
}

/**
 * Renders control characters as escapes so a generated command cannot
 * repaint the terminal (ANSI sequences, carriage returns) or hide text
 * behind zero-width characters. Newlines and tabs are kept.
 */
export function escapeControlChars(text: string): string {
  return text.replace(/[\u0000-\u0008\u000b-\u001f\u007f-\u009f\u200b-\u200d\ufeff]/g, (char) => {
    const code = char.codePointAt(0) ?? 0;
    return code > 0xff
      ? `\\u${code.toString(16).padStart(4, "0")}`
      : `\\x${code.toString(16).padStart(2, "0")}`;
  });
}

export function formatCommand(command: string, tty: boolean): string {
  return `${paint("Command:", BOLD, tty)} ${paint(escapeControlChars(command), CYAN, tty)}\n`;
}

export function formatDangerWarning(reason: string, tty: boolean): string {
  return `\n${paint("⚠️  WARNING: Dangerous command detected!", RED + BOLD, tty)}\nReason: ${reason}\n`;
}

export function formatInputFailure(message: string, tty: boolean): string {
  return `\n${paint(`No confirmation received (${message}).`, YELLOW, tty)}\n`;
}

export function formatVerdict(reason: string | undefined, tty: boolean): string {
  if (!reason) return `${paint("Safe:", BOLD, tty)} no dangerous pattern matched\n`;
  return `${paint("Dangerous:", RED + BOLD, tty)} ${reason}\n`;
}

export function formatError(message: string, tty: boolean): string {
  return `${paint("Error:", RED, tty)} ${message}\n`;
}
