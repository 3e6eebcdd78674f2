import type { AuditRecord } from "../types/audit";

export interface AuditSink {
  /** Hands a record over for persistence. Never throws and never waits. */
  record(record: AuditRecord): void;
}

export interface AuditWriter {
  write(record: AuditRecord, signal: AbortSignal): Promise<void>;
}

export function createAuditRecord(
  ip: string,
  originalQuery: string,
  sanitizedQuery: string,
  timestamp: Date = new Date()
): AuditRecord {
  return Object.freeze({ ip, originalQuery, sanitizedQuery, timestamp });
}
