import pino from "pino";
import { APP_NAME } from "./constants";

export function resolveLevel(env: NodeJS.ProcessEnv = process.env): string {
  const requested = env.LOG_LEVEL?.trim().toLowerCase();
  if (requested && (requested === "silent" || Object.hasOwn(pino.levels.values, requested))) {
    return requested;
  }
  return env.DEBUG ? "debug" : "warn";
}

// stdout carries the generated command and its output, so diagnostics go to stderr.
export const logger = pino(
  {
    name: APP_NAME,
    level: resolveLevel(),
    base: null,
  },
  pino.destination({ fd: 2, sync: true })
);
