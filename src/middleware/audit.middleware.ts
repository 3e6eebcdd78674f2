import type { NextFunction, Request } from "express";
import type { AuditSink } from "../audit/auditSink";
import { createAuditRecord } from "../audit/auditSink";
import { type GuardResponse, getGuardContext } from "./guard.context";

/**
 * Queues the audit record, stamped with the admission time, and moves straight
 * on to forwarding.
 */
export function auditDispatch(sink: AuditSink) {
  return (_req: Request, res: GuardResponse, next: NextFunction) => {
    const guard = getGuardContext(res);
    sink.record(
      createAuditRecord(
        guard.clientIp,
        guard.originalQuery,
        guard.sanitizedQuery,
        new Date(guard.receivedAt)
      )
    );
    next();
  };
}
