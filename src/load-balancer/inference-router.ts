import { BackendClient } from '../clients/backend-client';
import { OllamaBackendClient } from '../clients/ollama-client';
import { HealthProber } from '../health/health-prober';
import { HostStore } from '../hosts/host-store';
import {
  ExecuteOptions,
  GenerateResponse,
  HostRecord,
  LoadBalancingStrategy,
  ModelList,
  RouterConfig
} from '../types';
import {
  BackendCallError,
  ExhaustedRetriesError,
  InvalidHostError,
  NoHealthyHostError,
  describeError
} from '../utils/errors';
import { logger } from '../utils/logger';
import {
  backendRequestDuration,
  backendRequestsTotal,
  forgetHostMetrics,
  hostHealthStatus
} from '../utils/prometheus';
import { NO_BACKOFF, backoffDelay, sleep } from '../utils/retry';
import { selectHost } from './host-selector';

export interface RouterDependencies {
  backend: BackendClient;
  now?: () => number;
  random?: () => number;
}

/**
 * Routes inference calls across interchangeable backends, failing over to
 * another healthy host when an attempt fails.
 */
export class InferenceRouter {
  private readonly config: Readonly<RouterConfig>;
  private readonly store: HostStore;
  private readonly prober: HealthProber;
  private readonly backend: BackendClient;
  private readonly now: () => number;
  private readonly random: () => number;
  private cursor = 0;

  constructor(config: RouterConfig, dependencies: RouterDependencies) {
    this.config = Object.freeze({ ...config, hosts: [...config.hosts] });
    this.backend = dependencies.backend;
    this.now = dependencies.now ?? Date.now;
    this.random = dependencies.random ?? Math.random;
    this.store = new HostStore(config.hosts);
    this.prober = new HealthProber(
      this.store,
      this.backend,
      {
        interval: config.healthCheckIntervalMs,
        timeout: config.probeTimeoutMs ?? config.timeoutMs
      },
      this.now
    );
  }

  get strategy(): LoadBalancingStrategy {
    return this.config.strategy;
  }

  get defaultModel(): string {
    return this.config.defaultModel;
  }

  /**
   * Run one generation, retrying on other hosts per the failover policy.
   */
  async execute(prompt: string, options: ExecuteOptions = {}): Promise<GenerateResponse> {
    const model = options.model ?? this.config.defaultModel;
    const params = options.params ?? {};
    const backoff = this.config.retryBackoff ?? NO_BACKOFF;
    const startedAt = this.now();
    let lastError: BackendCallError | undefined;

    for (let attempt = 1; attempt <= this.config.maxRetries; attempt++) {
      if (attempt > 1 && options.deadlineMs !== undefined && this.now() - startedAt >= options.deadlineMs) {
        logger.warn('Call deadline reached before next attempt', {
          deadlineMs: options.deadlineMs,
          attempts: attempt - 1
        });
        break;
      }

      const host = await this.nextHost();
      const callStart = this.now();

      try {
        const response = await this.backend.generate(
          host.address,
          model,
          prompt,
          params,
          this.config.timeoutMs
        );

        this.store.update(host.address, { consecutiveFailures: 0 });
        backendRequestsTotal.inc({ host: host.address, outcome: 'success' });
        backendRequestDuration.observe({ host: host.address }, (this.now() - callStart) / 1000);

        logger.debug('Inference call succeeded', { host: host.address, model, attempt });
        return response;
      } catch (error) {
        const updated = this.store.update(host.address, current => ({
          status: 'unhealthy',
          consecutiveFailures: current.consecutiveFailures + 1
        }));
        backendRequestsTotal.inc({ host: host.address, outcome: 'failure' });
        if (updated) {
          hostHealthStatus.set({ host: host.address }, 0);
        }
        lastError = new BackendCallError(host.address, attempt, error);

        const willRetry = this.config.failoverEnabled && attempt < this.config.maxRetries;
        logger.warn(`Inference call failed on attempt ${attempt}/${this.config.maxRetries}`, {
          host: host.address,
          model,
          error: describeError(error),
          consecutiveFailures: updated?.consecutiveFailures,
          willRetry
        });

        if (!willRetry) {
          break;
        }
        await sleep(backoffDelay(attempt, backoff));
      }
    }

    if (lastError) {
      throw lastError;
    }
    throw new ExhaustedRetriesError();
  }

  /**
   * List models from one selected host. No retry: failures propagate.
   */
  async listModels(): Promise<ModelList> {
    const host = await this.nextHost();
    try {
      return await this.backend.listModels(host.address, this.config.timeoutMs);
    } catch (error) {
      throw new BackendCallError(host.address, 1, error);
    }
  }

  async hostStatus(force = true): Promise<HostRecord[]> {
    await this.prober.refreshAll(force);
    return this.store.all();
  }

  addHost(address: string): boolean {
    const trimmed = address.trim();
    if (!trimmed) {
      throw new InvalidHostError('Host address must not be empty');
    }
    const added = this.store.add(trimmed);
    if (added) {
      logger.info('Host added', { host: trimmed, totalHosts: this.store.size });
    }
    return added;
  }

  removeHost(address: string): number {
    const trimmed = address.trim();
    const removed = this.store.remove(trimmed);
    if (removed > 0) {
      forgetHostMetrics(trimmed);
      this.backend.release?.(trimmed);
      logger.info('Host removed', { host: trimmed, totalHosts: this.store.size });
    }
    return removed;
  }

  /**
   * Proactive refresh on a timer, until stop() is called.
   */
  start(): void {
    this.prober.start();
  }

  stop(): void {
    this.prober.stop();
  }

  private async nextHost(): Promise<HostRecord> {
    let host = this.select();
    if (!host) {
      await this.prober.refreshAll();
      host = this.select();
    }
    if (!host) {
      logger.error('No healthy hosts available', { totalHosts: this.store.size });
      throw new NoHealthyHostError(this.store.size);
    }
    return host;
  }

  private select(): HostRecord | undefined {
    const { host, cursor } = selectHost(this.config.strategy, this.store.healthy(), this.cursor, this.random);
    this.cursor = cursor;
    return host;
  }
}

/**
 * Router over Ollama backends unless another client is supplied
 */
export function createRouter(
  config: RouterConfig,
  backend: BackendClient = new OllamaBackendClient()
): InferenceRouter {
  return new InferenceRouter(config, { backend });
}
