import { BackendClient } from '../clients/backend-client';
import { HostStore } from '../hosts/host-store';
import { HostRecord, ProbeOutcome } from '../types';
import { AsyncMutex } from '../utils/async-mutex';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { hostHealthStatus, hostProbesTotal } from '../utils/prometheus';

export interface HealthProberConfig {
  interval: number; // milliseconds between refreshes
  timeout: number; // milliseconds per probe
}

export class HealthProber {
  private lastRefreshedAt: number | null = null;
  private timer?: NodeJS.Timeout;
  private readonly mutex = new AsyncMutex();

  constructor(
    private readonly store: HostStore,
    private readonly backend: BackendClient,
    private readonly config: HealthProberConfig,
    private readonly now: () => number = Date.now
  ) {}

  get lastRefresh(): number | null {
    return this.lastRefreshedAt;
  }

  /**
   * Probe one host by listing its models. Never throws: the outcome is
   * written to the store and returned.
   */
  async probe(host: HostRecord): Promise<ProbeOutcome> {
    const startTime = this.now();

    try {
      await this.backend.listModels(host.address, this.config.timeout);
      const latencyMs = this.now() - startTime;

      const updated = this.store.update(host.address, {
        status: 'healthy',
        lastLatencyMs: latencyMs,
        lastCheckedAt: this.now(),
        consecutiveFailures: 0
      });

      if (updated && host.status === 'unhealthy') {
        logger.info('Host recovered - marked as healthy', {
          host: host.address,
          latencyMs,
          event: 'host_recovered'
        });
      }

      hostProbesTotal.inc({ host: host.address, outcome: 'success' });
      if (updated) {
        hostHealthStatus.set({ host: host.address }, 1);
      }
      return { address: host.address, healthy: true, latencyMs };
    } catch (error) {
      const message = describeError(error);

      const updated = this.store.update(host.address, current => ({
        status: 'unhealthy',
        lastCheckedAt: this.now(),
        consecutiveFailures: current.consecutiveFailures + 1
      }));

      if (updated && host.status !== 'unhealthy') {
        logger.warn('Host marked as unhealthy after failed probe', {
          host: host.address,
          error: message,
          consecutiveFailures: updated.consecutiveFailures,
          event: 'failover_triggered'
        });
      } else if (updated) {
        logger.debug(`Host ${host.address} remains unhealthy`, {
          consecutiveFailures: updated.consecutiveFailures,
          error: message
        });
      }

      hostProbesTotal.inc({ host: host.address, outcome: 'failure' });
      if (updated) {
        hostHealthStatus.set({ host: host.address }, 0);
      }
      return { address: host.address, healthy: false, error: message };
    }
  }

  /**
   * Probe every host one after another, at most once per interval unless
   * forced. Resolves to false when skipped.
   */
  async refreshAll(force = false): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const now = this.now();
      if (!force && this.lastRefreshedAt !== null && now - this.lastRefreshedAt < this.config.interval) {
        return false;
      }
      this.lastRefreshedAt = now;

      for (const host of this.store.all()) {
        await this.probe(host);
      }

      logger.debug('Host health refreshed', {
        total: this.store.size,
        healthy: this.store.healthy().length,
        forced: force
      });
      return true;
    });
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.refreshAll().catch(error => {
        logger.error('Background health refresh failed', { error: describeError(error) });
      });
    }, Math.max(this.config.interval, 1000));
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  get running(): boolean {
    return this.timer !== undefined;
  }
}
