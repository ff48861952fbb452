import { homedir } from 'os';
import { join } from 'path';
import { LogLevel } from '@nestjs/common';

const DEFAULT_ENDPOINTS = [
  'https://daily-cloudcode-pa.googleapis.com',
  'https://cloudcode-pa.googleapis.com',
];

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

function parseEndpoints(value: string | undefined): string[] {
  if (!value) return DEFAULT_ENDPOINTS;

  const endpoints = value
    .split(',')
    .map((endpoint) => endpoint.trim().replace(/\/+$/, ''))
    .filter((endpoint) => endpoint.length > 0);

  return endpoints.length > 0 ? endpoints : DEFAULT_ENDPOINTS;
}

/**
 * Returns every level up to and including the configured one, the shape
 * `NestFactory.create({ logger })` expects.
 */
export function resolveLogLevels(value: string | undefined): LogLevel[] {
  const index = LOG_LEVELS.findIndex((level) => level === value);
  return LOG_LEVELS.slice(0, index === -1 ? 3 : index + 1);
}

export default () => ({
  port: parseInt(process.env.PORT ?? '3000', 10),

  logLevel: process.env.LOG_LEVEL ?? 'log',

  proxyApiKey: process.env.PROXY_API_KEY ?? '',

  adminApiKey: process.env.ADMIN_API_KEY ?? '',

  cloudcode: {
    projectId: process.env.CLOUDCODE_GCP_PROJECT_ID ?? '',
    endpoints: parseEndpoints(process.env.CLOUDCODE_ENDPOINTS),
    timeoutMs: parseInt(process.env.UPSTREAM_TIMEOUT_MS ?? '120000', 10),
    onboardPollIntervalMs: parseInt(
      process.env.ONBOARD_POLL_INTERVAL_MS ?? '2000',
      10,
    ),
    debugSse: process.env.DEBUG_SSE === 'true',
  },

  credentials: {
    path:
      process.env.CREDENTIALS_PATH ||
      join(homedir(), '.cloudcode', 'oauth_creds.json'),
  },

  // OAuth client credentials must be configured via environment variables
  oauth: {
    clientId: process.env.OAUTH_CLIENT_ID ?? '',
    clientSecret: process.env.OAUTH_CLIENT_SECRET ?? '',
    tokenUri: 'https://oauth2.googleapis.com/token',
  },
});
