import type { AuditDocument, AuditRecord } from "../types/audit";
import type { AuditWriter } from "./auditSink";

/** The slice of a MongoDB collection the writer uses. */
export interface AuditCollection {
  insertOne(doc: AuditDocument): Promise<unknown>;
}

/**
 * Inserts one document per record. Nothing here ever updates or deletes.
 */
export class MongoAuditWriter implements AuditWriter {
  constructor(private readonly collection: AuditCollection) {}

  async write(record: AuditRecord, signal: AbortSignal): Promise<void> {
    signal.throwIfAborted();
    await this.collection.insertOne({
      ip: record.ip,
      originalQuery: record.originalQuery,
      sanitizedQuery: record.sanitizedQuery,
      timestamp: record.timestamp,
    });
  }
}
