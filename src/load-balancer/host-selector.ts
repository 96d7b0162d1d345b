import { HostRecord, LoadBalancingStrategy } from '../types';

export interface Selection {
  host: HostRecord | undefined;
  /** Cursor value the caller should keep for the next selection */
  cursor: number;
}

/**
 * Picks the next host from the healthy subset. Performs no I/O; when the
 * subset is empty the caller decides whether to refresh and try again.
 */
export function selectHost(
  strategy: LoadBalancingStrategy,
  healthy: HostRecord[],
  cursor: number,
  random: () => number = Math.random
): Selection {
  if (healthy.length === 0) {
    return { host: undefined, cursor };
  }

  switch (strategy) {
    case 'round_robin':
      return roundRobin(healthy, cursor);
    case 'random':
      return { host: healthy[Math.floor(random() * healthy.length) % healthy.length], cursor };
    case 'priority':
      return { host: fastest(healthy), cursor };
    default:
      return roundRobin(healthy, cursor);
  }
}

// The cursor keeps counting; only the modulo tracks the subset size, so a
// shrinking subset can shift which host comes next.
function roundRobin(hosts: HostRecord[], cursor: number): Selection {
  return { host: hosts[cursor % hosts.length], cursor: cursor + 1 };
}

// "priority" means lowest observed probe latency, first in store order on ties.
function fastest(hosts: HostRecord[]): HostRecord {
  let selected = hosts[0];
  let best = selected.lastLatencyMs ?? Infinity;

  for (const host of hosts) {
    const latency = host.lastLatencyMs ?? Infinity;
    if (latency < best) {
      best = latency;
      selected = host;
    }
  }

  return selected;
}
