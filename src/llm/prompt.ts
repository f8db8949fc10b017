import type { SystemContext } from "../types";
import { GenerationError } from "../errors";

export function buildSystemPrompt(context: SystemContext): string {
  const files = context.files.length > 0 ? context.files.join(", ") : "(none visible)";

  return [
    "You are a command-line expert assistant. Generate a single shell command that accomplishes the user's goal.",
    "",
    "CRITICAL RULES:",
    "- Output ONLY the command itself, nothing else",
    "- No explanations, no markdown, no code blocks, no backticks",
    "- The command will be executed directly in the shell",
    "- Make sure the command is safe and correct",
    "",
    "SYSTEM CONTEXT:",
    `- Operating System: ${context.os}`,
    `- Architecture: ${context.arch}`,
    `- Shell: ${context.shell}`,
    `- Current Directory: ${context.workingDir}`,
    `- Available Files: ${files}`,
    "",
    "Generate the appropriate command for the user's request.",
  ].join("\n");
}

function stripCodeFence(text: string): string {
  if (!text.startsWith("```")) return text;
  const lines = text.split("\n");
  if (lines.length <= 2) return text;
  // Drop the opening fence (with its language tag) and the closing fence.
  return lines.slice(1, -1).join("\n").trim();
}

function trimBackticks(text: string): string {
  return text.replace(/^`+/, "").replace(/`+$/, "");
}

/**
 * Models ignore "no markdown" often enough that replies are cleaned before
 * anyone sees them: fences and stray backticks go, multi-line commands stay.
 */
export function parseCommandFromResponse(response: string): string {
  const command = trimBackticks(stripCodeFence(response.trim())).trim();
  if (!command) {
    throw new GenerationError("received empty response from model");
  }
  return command;
}
