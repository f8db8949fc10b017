import { DANGER_REASON_PREFIX } from "../constants";
import type { Verdict } from "../types";

/**
 * Screens a generated command against the configured dangerous fragments.
 *
 * Matching is plain case-insensitive substring containment: no regex, no
 * tokenizing, no word boundaries. A pattern written like a regex
 * (`curl.*|.*sh`) only matches when that literal text appears in the
 * command. Patterns are tried in order and the first hit names the reason.
 */
export function classifyCommand(command: string, patterns: readonly string[]): Verdict {
  const haystack = command.toLowerCase();

  for (const pattern of patterns) {
    if (haystack.includes(pattern.toLowerCase())) {
      return {
        dangerous: true,
        reason: `${DANGER_REASON_PREFIX}${pattern}`,
        pattern,
      };
    }
  }

  return { dangerous: false };
}
