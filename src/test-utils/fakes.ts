import { BackendClient } from '../clients/backend-client';
import { CallParams, GenerateResponse, ModelList, RouterConfig } from '../types';

export class ManualClock {
  private current: number;

  constructor(start = 1_000_000) {
    this.current = start;
  }

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface GenerateCall {
  address: string;
  model: string;
  prompt: string;
  params: CallParams;
  timeoutMs: number;
}

/**
 * In-process BackendClient. Every host answers until told to fail;
 * probe latency is simulated by advancing the shared clock.
 */
export class FakeBackend implements BackendClient {
  readonly generateCalls: GenerateCall[] = [];
  readonly probeCalls: Array<{ address: string; timeoutMs: number }> = [];
  readonly released: string[] = [];
  private failingGenerate = new Set<string>();
  private failingProbe = new Set<string>();
  private latencies = new Map<string, number>();

  constructor(private readonly clock?: ManualClock) {}

  failGenerate(...addresses: string[]): this {
    addresses.forEach(a => this.failingGenerate.add(a));
    return this;
  }

  failProbe(...addresses: string[]): this {
    addresses.forEach(a => this.failingProbe.add(a));
    return this;
  }

  recoverProbe(...addresses: string[]): this {
    addresses.forEach(a => this.failingProbe.delete(a));
    return this;
  }

  setLatency(address: string, ms: number): this {
    this.latencies.set(address, ms);
    return this;
  }

  async generate(
    address: string,
    model: string,
    prompt: string,
    params: CallParams,
    timeoutMs: number
  ): Promise<GenerateResponse> {
    this.generateCalls.push({ address, model, prompt, params, timeoutMs });
    if (this.failingGenerate.has(address)) {
      throw new Error(`connect ECONNREFUSED ${address}`);
    }
    return { model, response: `reply from ${address}`, done: true };
  }

  async listModels(address: string, timeoutMs: number): Promise<ModelList> {
    this.probeCalls.push({ address, timeoutMs });
    this.clock?.advance(this.latencies.get(address) ?? 0);
    if (this.failingProbe.has(address)) {
      throw new Error(`timeout of ${timeoutMs}ms exceeded`);
    }
    return { models: [{ name: 'gemma3:4b' }] };
  }

  release(address: string): void {
    this.released.push(address);
  }
}

export function routerConfig(overrides: Partial<RouterConfig> = {}): RouterConfig {
  return {
    hosts: ['http://a:11434', 'http://b:11434', 'http://c:11434'],
    defaultModel: 'gemma3:4b',
    timeoutMs: 5000,
    strategy: 'round_robin',
    failoverEnabled: true,
    healthCheckIntervalMs: 30000,
    maxRetries: 3,
    ...overrides
  };
}
