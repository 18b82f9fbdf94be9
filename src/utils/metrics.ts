export interface RateLimitMetrics {
  allowed: number;
  denied: number;
  rejected: number;
  evicted: number;
}

export function createMetrics(): RateLimitMetrics {
  return { allowed: 0, denied: 0, rejected: 0, evicted: 0 };
}

export function recordAllowed(metrics: RateLimitMetrics) {
  metrics.allowed++;
}

export function recordDenied(metrics: RateLimitMetrics) {
  metrics.denied++;
}

export function recordRejected(metrics: RateLimitMetrics) {
  metrics.rejected++;
}

export function recordEvicted(metrics: RateLimitMetrics, count: number) {
  metrics.evicted += count;
}

export function snapshotMetrics(metrics: RateLimitMetrics): RateLimitMetrics {
  return { ...metrics };
}
