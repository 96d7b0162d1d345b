import { z } from 'zod';

export const strategySchema = z.enum(['round_robin', 'random', 'priority'], {
  errorMap: () => ({ message: 'Strategy must be one of: round_robin, random, priority' })
});

export const hostAddressSchema = z.string().trim().url('Invalid host URL format');

export const routerConfigSchema = z.object({
  hosts: z.array(hostAddressSchema).min(1, 'At least one host is required'),
  defaultModel: z.string().min(1, 'Default model is required'),
  timeoutMs: z.number().int().positive(),
  probeTimeoutMs: z.number().int().positive().optional(),
  strategy: strategySchema,
  failoverEnabled: z.boolean(),
  healthCheckIntervalMs: z.number().int().min(0),
  maxRetries: z.number().int().min(0),
  retryBackoff: z.object({
    initialDelayMs: z.number().int().min(0),
    maxDelayMs: z.number().int().min(0),
    multiplier: z.number().min(1)
  }).optional()
});

// Backend responses: only the fields the router relies on are required,
// anything else the server sends is kept.
export const generateResponseSchema = z.object({
  model: z.string(),
  response: z.string(),
  done: z.boolean(),
  created_at: z.string().optional(),
  done_reason: z.string().optional(),
  context: z.array(z.number()).optional(),
  total_duration: z.number().optional(),
  load_duration: z.number().optional(),
  prompt_eval_count: z.number().optional(),
  prompt_eval_duration: z.number().optional(),
  eval_count: z.number().optional(),
  eval_duration: z.number().optional()
}).passthrough();

export const modelListSchema = z.object({
  models: z.array(z.object({
    name: z.string(),
    model: z.string().optional(),
    modified_at: z.string().optional(),
    size: z.number().optional(),
    digest: z.string().optional()
  }).passthrough())
});

export const generateRequestSchema = z.object({
  prompt: z.string().min(1, 'Prompt is required'),
  model: z.string().min(1).optional(),
  params: z.record(z.unknown()).optional()
});

export const hostInputSchema = z.object({
  address: hostAddressSchema
});

// Removal matches whatever address is stored, so only require a value
export const hostRemovalSchema = z.object({
  address: z.string().trim().min(1, 'address query parameter is required')
});
