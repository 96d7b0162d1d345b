import { CallParams, GenerateResponse, ModelList } from '../types';

/**
 * Transport to a single inference backend. Implementations throw on any
 * network, timeout, status or schema problem; the router does not look
 * at what was thrown beyond the fact that the call failed.
 */
export interface BackendClient {
  generate(
    address: string,
    model: string,
    prompt: string,
    params: CallParams,
    timeoutMs: number
  ): Promise<GenerateResponse>;

  listModels(address: string, timeoutMs: number): Promise<ModelList>;

  /** Drop any per-host state, such as pooled connections, once a host is removed */
  release?(address: string): void;
}
