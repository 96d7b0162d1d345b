export type HostStatus = 'unknown' | 'healthy' | 'unhealthy';

export type LoadBalancingStrategy = 'round_robin' | 'random' | 'priority';

export interface HostRecord {
  readonly address: string;
  readonly status: HostStatus;
  readonly lastCheckedAt: number | null; // epoch ms
  readonly lastLatencyMs: number | null;
  readonly consecutiveFailures: number;
}

export type HostRecordPatch = Partial<Omit<HostRecord, 'address'>>;

export interface RetryBackoffConfig {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export interface RouterConfig {
  hosts: string[];
  defaultModel: string;
  timeoutMs: number;
  probeTimeoutMs?: number;
  strategy: LoadBalancingStrategy;
  failoverEnabled: boolean;
  healthCheckIntervalMs: number;
  maxRetries: number;
  retryBackoff?: RetryBackoffConfig;
}

export type CallParams = Record<string, unknown>;

export interface GenerateResponse {
  model: string;
  response: string;
  done: boolean;
  created_at?: string;
  done_reason?: string;
  context?: number[];
  total_duration?: number;
  load_duration?: number;
  prompt_eval_count?: number;
  prompt_eval_duration?: number;
  eval_count?: number;
  eval_duration?: number;
}

export interface ModelInfo {
  name: string;
  model?: string;
  modified_at?: string;
  size?: number;
  digest?: string;
}

export interface ModelList {
  models: ModelInfo[];
}

export interface ProbeOutcome {
  address: string;
  healthy: boolean;
  latencyMs?: number;
  error?: string;
}

export interface ExecuteOptions {
  model?: string;
  params?: CallParams;
  /** Overall budget across all attempts, in milliseconds */
  deadlineMs?: number;
}
