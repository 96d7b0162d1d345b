import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { Agent } from 'http';
import { Agent as HttpsAgent } from 'https';

export interface ConnectionPoolOptions {
  maxSockets?: number;
  maxFreeSockets?: number;
  /** Replaces the HTTP transport; used to serve requests in-process */
  adapter?: AxiosAdapter;
}

/**
 * Keep-alive axios clients, one per backend base URL
 */
export class ConnectionPool {
  private httpAgent: Agent;
  private httpsAgent: HttpsAgent;
  private clients: Map<string, AxiosInstance> = new Map();
  private adapter?: AxiosAdapter;

  constructor(options: ConnectionPoolOptions = {}) {
    const { maxSockets = 50, maxFreeSockets = 10 } = options;
    this.adapter = options.adapter;

    this.httpAgent = new Agent({
      keepAlive: true,
      keepAliveMsecs: 1000,
      maxSockets,
      maxFreeSockets
    });

    this.httpsAgent = new HttpsAgent({
      keepAlive: true,
      keepAliveMsecs: 1000,
      maxSockets,
      maxFreeSockets
    });
  }

  getClient(baseURL: string): AxiosInstance {
    const existing = this.clients.get(baseURL);
    if (existing) {
      return existing;
    }

    const isHttps = baseURL.startsWith('https://');
    const client = axios.create({
      baseURL,
      httpAgent: !isHttps ? this.httpAgent : undefined,
      httpsAgent: isHttps ? this.httpsAgent : undefined,
      adapter: this.adapter,
      maxRedirects: 5
    });

    this.clients.set(baseURL, client);
    return client;
  }

  release(baseURL: string): boolean {
    return this.clients.delete(baseURL);
  }

  get size(): number {
    return this.clients.size;
  }

  destroy(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    this.clients.clear();
  }
}
