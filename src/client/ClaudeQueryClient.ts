import { spawn } from 'child_process';
import { delimiter, dirname } from 'path';
import { QueryClient } from './QueryClient';
import { QueryResult, fault, ok } from './QueryResult';
import { ClientConfig } from '../config/ClientConfig';
import { ILogger } from '../utils/ILogger';
import { Logger } from '../utils/Logger';

export interface ClaudeQueryClientOptions {
  claudePath?: string;
  /**
   * Kill the claude process after this many milliseconds. 0 waits indefinitely.
   * At most 2147483647.
   */
  timeoutMs?: number;
  logger?: ILogger;
}

const TRAILING_LINE_BREAK = /\r?\n$/;

/**
 * Answers prompts by running the claude CLI in print mode (`claude -p <prompt>`).
 * Settings not passed in are read from the environment.
 *
 * When `claudePath` names a directory, that directory is put first on the
 * child's PATH so a node-script install (nvm, npm global) finds its `node`.
 */
export class ClaudeQueryClient implements QueryClient {
  private readonly claudePath: string;
  private readonly timeoutMs: number;
  private readonly logger: ILogger;

  constructor(options: ClaudeQueryClientOptions = {}) {
    const config = ClientConfig.fromEnv(process.env, {
      claudePath: options.claudePath,
      timeoutMs: options.timeoutMs,
      // an injected logger makes the configured level irrelevant
      logLevel: options.logger ? 'silent' : undefined,
    });

    this.claudePath = config.claudePath;
    this.timeoutMs = config.timeoutMs;
    this.logger = (options.logger ?? new Logger({ level: config.logLevel })).child({
      component: 'ClaudeQueryClient',
    });
  }

  query(prompt: string): Promise<QueryResult> {
    return new Promise((resolve) => {
      const startedAt = Date.now();
      const args = ['-p', prompt];

      this.logger.debug('Spawning claude', { binary: this.claudePath, prompt });

      const child = spawn(this.claudePath, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false,
        env: this.childEnv(),
      });

      let stdout = '';
      let stderr = '';
      let settled = false;
      let timeoutId: NodeJS.Timeout | null = null;

      const settle = (result: QueryResult): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timeoutId !== null) {
          clearTimeout(timeoutId);
        }
        this.logger.debug('claude finished', {
          ok: result.ok,
          duration: Date.now() - startedAt,
        });
        resolve(result);
      };

      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      if (this.timeoutMs > 0) {
        timeoutId = setTimeout(() => {
          child.kill('SIGTERM');
          // Release the pipes so a child that ignores SIGTERM cannot keep us alive
          child.stdout?.destroy();
          child.stderr?.destroy();
          child.unref();
          settle(fault(`claude timed out after ${this.timeoutMs}ms`));
        }, this.timeoutMs);
      }

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (signal) {
          settle(fault(`claude terminated by ${signal}`));
        } else if (code === 0) {
          settle(ok(stdout.replace(TRAILING_LINE_BREAK, '')));
        } else {
          const detail = stderr.trim();
          settle(fault(detail.length > 0 ? detail : `claude exited with code ${code ?? 'unknown'}`));
        }
      });

      child.on('error', (error: Error) => {
        this.logger.warn('Failed to run claude', { binary: this.claudePath, error: error.message });
        if ('code' in error && error.code === 'ENOENT') {
          settle(fault(`claude not found at ${this.claudePath}; install it or set ASK_CLAUDE_PATH`));
        } else {
          settle(fault(error.message));
        }
      });
    });
  }

  private childEnv(): NodeJS.ProcessEnv {
    const env = { ...process.env };
    const binDir = dirname(this.claudePath);
    if (binDir !== '.') {
      env.PATH = env.PATH ? `${binDir}${delimiter}${env.PATH}` : binDir;
    }
    return env;
  }
}
