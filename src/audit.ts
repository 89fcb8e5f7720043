import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";

export type AuditEvent =
  | "agent_started"
  | "tick_decision"
  | "order_submitted"
  | "order_failed"
  | "order_cancelled"
  | "cancel_failed"
  | "loop_stopped";

export type AuditEntry = {
  ts: string;
  event: string;
  payload: Record<string, unknown>;
};

export type AuditLog = {
  path: string;
  record: (event: AuditEvent, payload: Record<string, unknown>) => Promise<void>;
  tail: (limit?: number) => Promise<AuditEntry[]>;
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function parseLine(line: string): AuditEntry {
  try {
    const parsed: unknown = JSON.parse(line);
    if (parsed && typeof parsed === "object" && "event" in parsed && "ts" in parsed) {
      const { ts, event } = parsed;
      const payload = "payload" in parsed ? parsed.payload : {};
      return {
        ts: String(ts),
        event: String(event),
        payload: payload && typeof payload === "object" ? { ...payload } : {}
      };
    }
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error;
  }
  return { ts: new Date().toISOString(), event: "audit_parse_error", payload: { line } };
}

/** Append-only JSON-lines audit trail. Write failures are logged, never thrown. */
export function createAuditLog(path: string): AuditLog {
  let ready: Promise<unknown> | null = null;

  return {
    path,
    async record(event, payload) {
      const entry: AuditEntry = { ts: new Date().toISOString(), event, payload };
      try {
        ready ??= mkdir(dirname(path), { recursive: true });
        await ready;
        await appendFile(path, `${JSON.stringify(entry)}\n`, "utf-8");
      } catch (error) {
        ready = null;
        console.error("audit.write_failed", { path, event, error });
      }
    },
    async tail(limit = 200) {
      let raw: string;
      try {
        raw = await readFile(path, "utf-8");
      } catch (error) {
        if (isMissingFile(error)) return [];
        throw error;
      }
      const lines = raw.trim().split("\n").filter(Boolean);
      return lines.slice(-limit).map(parseLine);
    }
  };
}
