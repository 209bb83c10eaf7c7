const metrics = {
  allowed: 0,
  blocked: 0,
  rejected: 0,
};

export type Metrics = typeof metrics;

export function recordAllowed() {
  metrics.allowed++;
}

export function recordBlocked() {
  metrics.blocked++;
}

// Requests whose cost could never be admitted
export function recordRejected() {
  metrics.rejected++;
}

export function getMetrics(): Metrics {
  return { ...metrics };
}

export function resetMetrics() {
  metrics.allowed = 0;
  metrics.blocked = 0;
  metrics.rejected = 0;
}
