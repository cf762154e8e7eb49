import { Environment } from './types';

export interface EnvOverrides {
  claudePath?: string;
  timeoutMs?: number;
  logLevel?: string;
}

export function applyEnvOverrides(env: Environment): EnvOverrides {
  const overrides: EnvOverrides = {};

  if (env.ASK_CLAUDE_PATH) {
    overrides.claudePath = env.ASK_CLAUDE_PATH;
  }

  if (env.ASK_CLAUDE_TIMEOUT_MS) {
    overrides.timeoutMs = parseInt(env.ASK_CLAUDE_TIMEOUT_MS, 10);
  }

  if (env.ASK_CLAUDE_LOG_LEVEL) {
    overrides.logLevel = env.ASK_CLAUDE_LOG_LEVEL;
  }

  return overrides;
}
