import { ClientConfig } from '../../src/config/ClientConfig';
import { applyEnvOverrides } from '../../src/config/envOverrides';
import { ConfigError } from '../../src/errors/ConfigError';

describe('ClientConfig', () => {
  it('uses defaults when the environment sets nothing', () => {
    const config = ClientConfig.fromEnv({});

    expect(config.claudePath).toBe('claude');
    expect(config.timeoutMs).toBe(0);
    expect(config.logLevel).toBe('silent');
  });

  it('reads every setting from the environment', () => {
    const config = ClientConfig.fromEnv({
      ASK_CLAUDE_PATH: '/opt/homebrew/bin/claude',
      ASK_CLAUDE_TIMEOUT_MS: '60000',
      ASK_CLAUDE_LOG_LEVEL: 'debug',
    });

    expect(config.claudePath).toBe('/opt/homebrew/bin/claude');
    expect(config.timeoutMs).toBe(60000);
    expect(config.logLevel).toBe('debug');
  });

  it('ignores empty variables', () => {
    const config = ClientConfig.fromEnv({ ASK_CLAUDE_PATH: '', ASK_CLAUDE_TIMEOUT_MS: '' });

    expect(config.claudePath).toBe('claude');
    expect(config.timeoutMs).toBe(0);
  });

  it('rejects a negative timeout', () => {
    expect(() => ClientConfig.fromEnv({ ASK_CLAUDE_TIMEOUT_MS: '-5' })).toThrow(
      'Invalid configuration: timeoutMs: Number must be greater than or equal to 0'
    );
  });

  it('accepts the largest timer delay', () => {
    expect(ClientConfig.fromEnv({ ASK_CLAUDE_TIMEOUT_MS: '2147483647' }).timeoutMs).toBe(2147483647);
  });

  it('rejects a timeout above the largest timer delay', () => {
    expect(() => ClientConfig.fromEnv({ ASK_CLAUDE_TIMEOUT_MS: '3000000000' })).toThrow(
      'Invalid configuration: timeoutMs: Number must be less than or equal to 2147483647'
    );
  });

  it('lets explicit settings replace environment values', () => {
    const config = ClientConfig.fromEnv(
      { ASK_CLAUDE_PATH: '/opt/claude/bin/claude', ASK_CLAUDE_TIMEOUT_MS: 'soon' },
      { timeoutMs: 250, logLevel: undefined }
    );

    expect(config.claudePath).toBe('/opt/claude/bin/claude');
    expect(config.timeoutMs).toBe(250);
    expect(config.logLevel).toBe('silent');
  });

  it('validates explicit settings too', () => {
    expect(() => ClientConfig.fromEnv({}, { claudePath: '' })).toThrow(ConfigError);
  });

  it('rejects a timeout that is not a number', () => {
    expect(() => ClientConfig.fromEnv({ ASK_CLAUDE_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
  });

  it('rejects an unknown log level and lists the issue in the context', () => {
    let caught: unknown;
    try {
      ClientConfig.fromEnv({ ASK_CLAUDE_LOG_LEVEL: 'loud' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.code).toBe('CONFIG_ERROR');
      expect(caught.message).toMatch(/^Invalid configuration: logLevel: /);
      expect(caught.context).toEqual({
        issues: [{ path: 'logLevel', message: expect.stringContaining('loud') }],
      });
    }
  });

  it('validates a plain object', () => {
    expect(ClientConfig.validate({ claudePath: '/bin/claude' })).toEqual({
      claudePath: '/bin/claude',
      timeoutMs: 0,
      logLevel: 'silent',
    });
  });
});

describe('applyEnvOverrides', () => {
  it('returns only the variables that are set', () => {
    expect(applyEnvOverrides({ ASK_CLAUDE_TIMEOUT_MS: '250', UNRELATED: 'x' })).toEqual({ timeoutMs: 250 });
  });

  it('parses the timeout as a base-10 integer', () => {
    expect(applyEnvOverrides({ ASK_CLAUDE_TIMEOUT_MS: '0900ms' })).toEqual({ timeoutMs: 900 });
  });
});
