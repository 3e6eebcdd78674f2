const metrics = {
  allowed: 0,
  blocked: 0,
  limiterErrors: 0,
  auditWritten: 0,
  auditDropped: 0,
  upstreamErrors: 0,
};

export type GuardMetrics = typeof metrics;

export function recordAllowed() {
  metrics.allowed++;
}

export function recordBlocked() {
  metrics.blocked++;
}

export function recordLimiterError() {
  metrics.limiterErrors++;
}

export function recordAuditWritten() {
  metrics.auditWritten++;
}

export function recordAuditDropped() {
  metrics.auditDropped++;
}

export function recordUpstreamError() {
  metrics.upstreamErrors++;
}

export function getMetrics(): Readonly<GuardMetrics> {
  return { ...metrics };
}

export function resetMetrics() {
  metrics.allowed = 0;
  metrics.blocked = 0;
  metrics.limiterErrors = 0;
  metrics.auditWritten = 0;
  metrics.auditDropped = 0;
  metrics.upstreamErrors = 0;
}
