import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type CheckVerdict = 'allow' | 'reject';

export interface CheckMetrics {
  verdict: CheckVerdict;
  /** `none` for allowed payloads, otherwise the outcome reason. */
  reason: string;
  backend: string;
  durationMs: number;
}

export interface CompileMetrics {
  backend: string;
  success: boolean;
  patterns?: number;
  warnings?: number;
  version?: number;
}

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const checkCounter = new Counter({
  name: 'deny_guard_checks_total',
  help: 'Number of payload checks by verdict',
  labelNames: ['verdict', 'reason', 'backend'],
  registers: [registry],
});

const checkDuration = new Histogram({
  name: 'deny_guard_check_duration_seconds',
  help: 'Duration of payload checks in seconds',
  labelNames: ['backend'],
  buckets: [0.00001, 0.00005, 0.0001, 0.0005, 0.001, 0.005, 0.01, 0.05, 0.1],
  registers: [registry],
});

const compileCounter = new Counter({
  name: 'deny_guard_compiles_total',
  help: 'Number of deny list compilations',
  labelNames: ['backend', 'result'],
  registers: [registry],
});

const patternsGauge = new Gauge({
  name: 'deny_guard_active_patterns',
  help: 'Number of patterns in the active matcher',
  labelNames: ['backend'],
  registers: [registry],
});

const warningsGauge = new Gauge({
  name: 'deny_guard_compile_warnings',
  help: 'Number of skipped words in the last successful compilation',
  registers: [registry],
});

const versionGauge = new Gauge({
  name: 'deny_guard_matcher_version',
  help: 'Version of the matcher currently serving checks',
  registers: [registry],
});

export function recordCheckMetrics(metrics: CheckMetrics): void {
  checkCounter.inc({ verdict: metrics.verdict, reason: metrics.reason, backend: metrics.backend });
  checkDuration.observe({ backend: metrics.backend }, metrics.durationMs / 1000);
}

export function recordCompileMetrics(metrics: CompileMetrics): void {
  compileCounter.inc({ backend: metrics.backend, result: metrics.success ? 'success' : 'failure' });
  if (!metrics.success) {
    return;
  }
  patternsGauge.reset();
  patternsGauge.labels(metrics.backend).set(metrics.patterns ?? 0);
  warningsGauge.set(metrics.warnings ?? 0);
  if (metrics.version !== undefined) {
    versionGauge.set(metrics.version);
  }
}

export function metricsContentType(): string {
  return registry.contentType;
}

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
