import { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { ZodError } from 'zod';
import { ConnectionPool } from './connection-pool';
import { OllamaBackendClient } from './ollama-client';

const HOST = 'http://gpu-1:11434';

function clientAnswering(data: unknown) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async config => {
    requests.push(config);
    return { data, status: 200, statusText: 'OK', headers: {}, config };
  };
  const pool = new ConnectionPool({ adapter });
  return { requests, pool, client: new OllamaBackendClient(pool) };
}

describe('OllamaBackendClient', () => {
  describe('generate', () => {
    it('should post a non-streaming generate request to the host', async () => {
      const { requests, client } = clientAnswering({ model: 'gemma3:4b', response: 'hi', done: true });

      await client.generate(HOST, 'gemma3:4b', 'hello', { temperature: 0.1 }, 1234);

      expect(requests).toHaveLength(1);
      expect(requests[0].method).toBe('post');
      expect(requests[0].baseURL).toBe(HOST);
      expect(requests[0].url).toBe('/api/generate');
      expect(requests[0].timeout).toBe(1234);
      expect(JSON.parse(requests[0].data)).toEqual({
        temperature: 0.1,
        model: 'gemma3:4b',
        prompt: 'hello',
        stream: false
      });
    });

    it('should not let params override the model, prompt or stream flag', async () => {
      const { requests, client } = clientAnswering({ model: 'gemma3:4b', response: 'hi', done: true });

      await client.generate(HOST, 'gemma3:4b', 'hello', { model: 'other', stream: true }, 1000);

      expect(JSON.parse(requests[0].data)).toEqual({ model: 'gemma3:4b', prompt: 'hello', stream: false });
    });

    it('should keep extra response fields', async () => {
      const { client } = clientAnswering({ model: 'gemma3:4b', response: 'hi', done: true, eval_count: 7, custom: 'x' });

      const response = await client.generate(HOST, 'gemma3:4b', 'hello', {}, 1000);

      expect(response).toEqual({ model: 'gemma3:4b', response: 'hi', done: true, eval_count: 7, custom: 'x' });
    });

    it('should reject a malformed response body', async () => {
      const { client } = clientAnswering({ model: 'gemma3:4b' });

      await expect(client.generate(HOST, 'gemma3:4b', 'hello', {}, 1000)).rejects.toBeInstanceOf(ZodError);
    });

    it('should propagate transport failures', async () => {
      const adapter: AxiosAdapter = async () => {
        throw new Error('socket hang up');
      };
      const client = new OllamaBackendClient(new ConnectionPool({ adapter }));

      await expect(client.generate(HOST, 'gemma3:4b', 'hello', {}, 1000)).rejects.toThrow('socket hang up');
    });
  });

  describe('listModels', () => {
    it('should read the model tags with the given timeout', async () => {
      const { requests, client } = clientAnswering({ models: [{ name: 'gemma3:4b', size: 3 }] });

      const models = await client.listModels(HOST, 500);

      expect(models).toEqual({ models: [{ name: 'gemma3:4b', size: 3 }] });
      expect(requests[0].method).toBe('get');
      expect(requests[0].url).toBe('/api/tags');
      expect(requests[0].timeout).toBe(500);
    });

    it('should reject a body without a model list', async () => {
      const { client } = clientAnswering({ tags: [] });

      await expect(client.listModels(HOST, 500)).rejects.toBeInstanceOf(ZodError);
    });
  });

  it('should reuse one axios client per host', async () => {
    const { pool, client } = clientAnswering({ models: [] });

    await client.listModels(HOST, 500);
    await client.listModels(HOST, 500);
    await client.listModels('http://gpu-2:11434', 500);

    expect(pool.size).toBe(2);
    client.release(HOST);
    expect(pool.size).toBe(1);
    client.destroy();
    expect(pool.size).toBe(0);
  });
});
