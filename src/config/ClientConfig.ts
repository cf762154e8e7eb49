import { z } from 'zod';
import { ClientConfigSchema, ClientConfigData, ClientSettings, Environment } from './types';
import { applyEnvOverrides } from './envOverrides';
import { ConfigError } from '../errors/ConfigError';
import { LogLevel } from '../utils/Logger';

/**
 * Settings of the default query client, sourced from the environment.
 */
export class ClientConfig {
  static validate(input: unknown): ClientConfigData {
    const result = ClientConfigSchema.safeParse(input);
    if (!result.success) {
      throw ClientConfig.toConfigError(result.error);
    }
    return result.data;
  }

  /**
   * Explicit settings replace the matching environment values before
   * validation, so an invalid variable they shadow is never reported.
   */
  static fromEnv(env: Environment = process.env, explicit: ClientSettings = {}): ClientConfig {
    const input: Record<string, unknown> = { ...applyEnvOverrides(env) };
    for (const [key, value] of Object.entries(explicit)) {
      if (value !== undefined) {
        input[key] = value;
      }
    }
    return new ClientConfig(ClientConfig.validate(input));
  }

  private static toConfigError(error: z.ZodError): ConfigError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    return new ConfigError(`Invalid configuration: ${summary}`, { issues });
  }

  constructor(private data: ClientConfigData) {}

  get claudePath(): string {
    return this.data.claudePath;
  }

  get timeoutMs(): number {
    return this.data.timeoutMs;
  }

  get logLevel(): LogLevel {
    return this.data.logLevel;
  }
}
