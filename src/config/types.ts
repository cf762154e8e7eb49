import { z } from 'zod';

// Largest delay setTimeout accepts; anything above fires immediately.
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const ClientConfigSchema = z.object({
  claudePath: z.string().min(1).default('claude'),
  timeoutMs: z.number().int().min(0).max(MAX_TIMEOUT_MS).default(0), // 0 disables the timeout
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('silent'),
});

export type ClientConfigData = z.infer<typeof ClientConfigSchema>;

export type ClientSettings = Partial<ClientConfigData>;

export type Environment = Record<string, string | undefined>;
