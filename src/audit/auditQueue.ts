import type { AuditRecord } from "../types/audit";
import type { AuditSink, AuditWriter } from "./auditSink";
import { logger } from "../utils/logger";
import { recordAuditDropped, recordAuditWritten } from "../utils/metrics";

export interface AuditQueueOptions {
  /** Records waiting beyond this are dropped. */
  capacity: number;
  writeTimeoutMs: number;
}

class AuditTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`audit write timed out after ${timeoutMs}ms`);
    this.name = "AuditTimeoutError";
  }
}

/**
 * Bounded FIFO drained by a single writer loop. Writes are attempted once,
 * capped by a timeout, and dropped with a log line when they fail.
 */
export class AuditQueue implements AuditSink {
  private readonly pending: AuditRecord[] = [];
  private draining: Promise<void> | null = null;
  private closed = false;

  constructor(
    private readonly writer: AuditWriter,
    private readonly options: AuditQueueOptions
  ) {}

  get size(): number {
    return this.pending.length;
  }

  record(record: AuditRecord): void {
    if (this.closed) {
      this.drop(record, "audit queue closed");
      return;
    }
    if (this.pending.length >= this.options.capacity) {
      this.drop(record, "audit queue full");
      return;
    }

    this.pending.push(record);
    if (!this.draining) {
      this.draining = this.drain();
    }
  }

  /** Resolves once every queued record has been written or dropped. */
  async onIdle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.onIdle();
  }

  private async drain(): Promise<void> {
    let next = this.pending.shift();
    while (next) {
      await this.writeOne(next);
      next = this.pending.shift();
    }
    // cleared in the same turn as the empty check so record() restarts the loop
    this.draining = null;
  }

  private async writeOne(record: AuditRecord): Promise<void> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new AuditTimeoutError(this.options.writeTimeoutMs);
        controller.abort(err);
        reject(err);
      }, this.options.writeTimeoutMs);
    });

    try {
      await Promise.race([this.writer.write(record, controller.signal), timeout]);
      recordAuditWritten();
    } catch (err) {
      this.drop(record, "audit write failed", err);
    } finally {
      clearTimeout(timer);
    }
  }

  private drop(record: AuditRecord, reason: string, err?: unknown): void {
    recordAuditDropped();
    logger.warn({ err, ip: record.ip, timestamp: record.timestamp }, reason);
  }
}
