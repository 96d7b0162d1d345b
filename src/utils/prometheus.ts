import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export const register = new Registry();

register.setDefaultLabels({
  app: 'inference-router'
});

export const backendRequestsTotal = new Counter({
  name: 'backend_requests_total',
  help: 'Total number of inference calls sent to backend hosts',
  labelNames: ['host', 'outcome'],
  registers: [register]
});

export const backendRequestDuration = new Histogram({
  name: 'backend_request_duration_seconds',
  help: 'Duration of inference calls to backend hosts in seconds',
  labelNames: ['host'],
  buckets: [0.1, 0.5, 1, 3, 5, 10, 30, 60, 120, 300],
  registers: [register]
});

export const hostHealthStatus = new Gauge({
  name: 'host_health_status',
  help: 'Health status of backend hosts (1 = healthy, 0 = unhealthy)',
  labelNames: ['host'],
  registers: [register]
});

export const hostProbesTotal = new Counter({
  name: 'host_probes_total',
  help: 'Total number of health probes by outcome',
  labelNames: ['host', 'outcome'],
  registers: [register]
});

const OUTCOMES = ['success', 'failure'];

/**
 * Drop every series labelled with this host
 */
export function forgetHostMetrics(host: string): void {
  hostHealthStatus.remove({ host });
  backendRequestDuration.remove({ host });
  for (const outcome of OUTCOMES) {
    backendRequestsTotal.remove({ host, outcome });
    hostProbesTotal.remove({ host, outcome });
  }
}
