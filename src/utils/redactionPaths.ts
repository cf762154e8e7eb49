export const DEFAULT_REDACTION_PATHS = [
  'prompt',
  'response',
  '*.prompt',
  '*.response',
  'apiKey',
  'env.ANTHROPIC_API_KEY',
];
