/**
 * Per-request state shared by the guard middleware, kept on res.locals.guard.
 */
export interface GuardContext {
  body: Buffer;
  originalQuery: string;
  sanitizedQuery: string;
  clientIp: string;
  /** Epoch ms of the admission check; also the audit timestamp. */
  receivedAt: number;
}
