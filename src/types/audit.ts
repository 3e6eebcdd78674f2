export interface AuditRecord {
  readonly ip: string;
  readonly originalQuery: string;
  readonly sanitizedQuery: string;
  readonly timestamp: Date;
}

/** Stored shape of an audit record. */
export type AuditDocument = {
  ip: string;
  originalQuery: string;
  sanitizedQuery: string;
  timestamp: Date;
};
