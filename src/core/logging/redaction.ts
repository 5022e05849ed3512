/**
 * Redaction paths for pino.
 *
 * Upload descriptors carry signed remote URLs and the API key may appear in
 * request context, so both are scrubbed wherever they show up one level deep.
 */
export const REDACTION_CONFIG: { paths: string[]; censor: string } = {
  paths: [
    'apiKey',
    'token',
    'authorization',
    'remoteUrl',

    '*.apiKey',
    '*.token',
    '*.authorization',
    '*.remoteUrl',

    'headers.authorization',
    'headers.Authorization',
    'headers["x-api-key"]',

    'upload.remoteUrl',
    'uploads.*.remoteUrl',
  ],
  censor: '[REDACTED]',
};
