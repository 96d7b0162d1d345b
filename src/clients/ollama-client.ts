import { BackendClient } from './backend-client';
import { ConnectionPool } from './connection-pool';
import { CallParams, GenerateResponse, ModelList } from '../types';
import { generateResponseSchema, modelListSchema } from '../utils/validation-schemas';

/**
 * BackendClient for Ollama-compatible servers. Responses are checked
 * against a schema here, so callers only ever see well-formed values.
 */
export class OllamaBackendClient implements BackendClient {
  private pool: ConnectionPool;

  constructor(pool: ConnectionPool = new ConnectionPool()) {
    this.pool = pool;
  }

  async generate(
    address: string,
    model: string,
    prompt: string,
    params: CallParams,
    timeoutMs: number
  ): Promise<GenerateResponse> {
    const client = this.pool.getClient(address);
    const response = await client.post<unknown>(
      '/api/generate',
      { ...params, model, prompt, stream: false },
      { timeout: timeoutMs }
    );
    return generateResponseSchema.parse(response.data);
  }

  async listModels(address: string, timeoutMs: number): Promise<ModelList> {
    const client = this.pool.getClient(address);
    const response = await client.get<unknown>('/api/tags', { timeout: timeoutMs });
    return modelListSchema.parse(response.data);
  }

  release(address: string): void {
    this.pool.release(address);
  }

  destroy(): void {
    this.pool.destroy();
  }
}
