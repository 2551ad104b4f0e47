import { appendFile, readFile } from "node:fs/promises";
import type { AuditEntry } from "@strikehouse/shared";

export async function audit(auditPath: string, event: string, payload: Record<string, unknown>): Promise<void> {
  const entry: AuditEntry = {
    ts: new Date().toISOString(),
    event,
    payload
  };

  try {
    await appendFile(auditPath, `${JSON.stringify(entry)}\n`, "utf-8");
  } catch (error) {
    console.error("Audit log write failed:", error);
  }
}

export async function readAuditEntries(auditPath: string, limit = 200): Promise<unknown[]> {
  let raw: string;
  try {
    raw = await readFile(auditPath, "utf-8");
  } catch {
    return [];
  }
  const lines = raw.trim().split("\n").filter(Boolean);
  return lines.slice(-limit).map((line): unknown => {
    try {
      return JSON.parse(line);
    } catch {
      return { ts: new Date().toISOString(), event: "audit_parse_error", payload: { line } };
    }
  });
}
