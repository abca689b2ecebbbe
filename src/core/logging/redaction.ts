/**
 * pino redaction paths. Hook payloads and env dumps can carry credentials
 * next to the session id; never write them to the log stream.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'secret',
    'password',
    'apiKey',
    'authorization',
    '*.token',
    '*.secret',
    '*.password',
    '*.apiKey',
    'env.*_TOKEN',
    'env.*_KEY',
    'payload.token',
  ],
  censor: '[REDACTED]',
};
