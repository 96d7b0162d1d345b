import { HostRecord, HostRecordPatch } from '../types';

type MutableHostRecord = { -readonly [K in keyof HostRecord]: HostRecord[K] };

/**
 * Ordered set of known backends. Insertion order is kept because
 * round-robin selection walks the hosts in that order.
 */
export class HostStore {
  private records: MutableHostRecord[] = [];

  constructor(addresses: string[] = []) {
    addresses.forEach(address => this.add(address));
  }

  get size(): number {
    return this.records.length;
  }

  add(address: string): boolean {
    if (this.records.some(r => r.address === address)) {
      return false;
    }
    this.records.push({
      address,
      status: 'unknown',
      lastCheckedAt: null,
      lastLatencyMs: null,
      consecutiveFailures: 0
    });
    return true;
  }

  remove(address: string): number {
    const before = this.records.length;
    this.records = this.records.filter(r => r.address !== address);
    return before - this.records.length;
  }

  get(address: string): HostRecord | undefined {
    const record = this.records.find(r => r.address === address);
    return record ? { ...record } : undefined;
  }

  all(): HostRecord[] {
    return this.records.map(r => ({ ...r }));
  }

  healthy(): HostRecord[] {
    return this.records.filter(r => r.status === 'healthy').map(r => ({ ...r }));
  }

  update(
    address: string,
    patch: HostRecordPatch | ((current: HostRecord) => HostRecordPatch)
  ): HostRecord | undefined {
    const record = this.records.find(r => r.address === address);
    if (!record) {
      return undefined;
    }
    const fields = typeof patch === 'function' ? patch({ ...record }) : patch;
    Object.assign(record, fields);
    if (record.consecutiveFailures < 0) {
      record.consecutiveFailures = 0;
    }
    return { ...record };
  }
}
