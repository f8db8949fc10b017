import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import type { AuditDecision, Verdict } from "./types";
import { configDir } from "./config";
import { isEnabled } from "./utils/env";
import { logger } from "./logger";

export interface AuditEntry {
  timestamp: string;
  command: string;
  decision: AuditDecision;
  dangerous: boolean;
  reason?: string;
  detail?: string;
  cwd: string;
}

export function auditLogPath(): string {
  return join(configDir(), "audit.log");
}

export function buildAuditEntry(
  command: string,
  verdict: Verdict,
  decision: AuditDecision,
  detail?: string
): AuditEntry {
  return {
    timestamp: new Date().toISOString(),
    command,
    decision,
    dangerous: verdict.dangerous,
    reason: verdict.dangerous ? verdict.reason : undefined,
    detail,
    cwd: process.cwd(),
  };
}

export function logAudit(
  command: string,
  verdict: Verdict,
  decision: AuditDecision,
  detail?: string,
  path = auditLogPath()
): void {
  if (isEnabled(process.env.ASKSHELL_AUDIT_DISABLED)) return;
  try {
    const dir = dirname(path);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    appendFileSync(path, JSON.stringify(buildAuditEntry(command, verdict, decision, detail)) + "\n");
  } catch (error) {
    logger.debug({ err: error, path }, "could not write audit log");
  }
}
