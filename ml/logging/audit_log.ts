import * as fs from "fs";
import * as path from "path";
import crypto from "node:crypto";
import type { AuditEvent, AuditEventType, AuditPayload } from "./log_types";
import { assertValid, validateAuditEvent } from "../schemas/validators";

export interface AuditSink {
  append(event: AuditEvent): Promise<void>;
}

export type JsonlAuditLogConfig = {
  logDir?: string;
};

function getDefaultLogDir() {
  return process.env.AUDIT_LOG_DIR ?? path.join(process.cwd(), "ml", "logs");
}

export function createAuditEvent(type: AuditEventType, payload: AuditPayload, now: Date = new Date()): AuditEvent {
  return {
    id: crypto.randomUUID(),
    type,
    payload,
    timestamp: now.toISOString(),
  };
}

/**
 * Append-only audit trail, one JSON line per event in a daily file.
 *
 * Each event is a single appendFileSync call, so concurrent writers may interleave
 * whole lines but never fragments of one.
 */
export class JsonlAuditLog implements AuditSink {
  private logDir: string;

  constructor(config: JsonlAuditLogConfig = {}) {
    this.logDir = config.logDir ?? getDefaultLogDir();
    fs.mkdirSync(this.logDir, { recursive: true });
  }

  async append(event: AuditEvent): Promise<void> {
    assertValid(validateAuditEvent, event, "AuditEvent");
    const dateKey = event.timestamp.slice(0, 10);
    const logPath = path.join(this.logDir, `audit-${dateKey}.jsonl`);
    fs.appendFileSync(logPath, `${JSON.stringify(event)}\n`);
  }

  readAll(): AuditEvent[] {
    if (!fs.existsSync(this.logDir)) return [];
    const files = fs
      .readdirSync(this.logDir)
      .filter((file) => file.startsWith("audit-") && file.endsWith(".jsonl"))
      .sort();
    return files.flatMap((file) =>
      fs
        .readFileSync(path.join(this.logDir, file), "utf-8")
        .split(/\r?\n/)
        .filter((line) => line.trim().length > 0)
        .map((line) => JSON.parse(line) as AuditEvent)
    );
  }
}

export class MemoryAuditSink implements AuditSink {
  readonly events: AuditEvent[] = [];

  async append(event: AuditEvent): Promise<void> {
    assertValid(validateAuditEvent, event, "AuditEvent");
    this.events.push(event);
  }

  ofType(type: AuditEventType): AuditEvent[] {
    return this.events.filter((event) => event.type === type);
  }
}
