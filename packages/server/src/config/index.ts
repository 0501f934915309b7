import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import * as constants from './constants.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(env: NodeJS.ProcessEnv, envVar: string): string | undefined {
  const filePath = env[`${envVar}_FILE`];

  if (filePath && existsSync(filePath)) {
    return readFileSync(filePath, 'utf-8').trim();
  }

  return env[envVar];
}

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const secondsSchema = z.coerce.number().int().positive();

const configSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().min(0).max(65535),
    host: z.string().min(1),
    nodeEnv: z.string().min(1),
  }),
  logging: z.object({
    level: logLevelSchema,
  }),
  tokenEndpoint: z.object({
    path: z.string().startsWith('/'),
    responseFormat: z.enum(['json', 'text']),
    issuer: z.string().url(),
    jwtSigningKey: z.string().min(32).optional(),
  }),
  defaults: z.object({
    accessTokenTtl: secondsSchema,
    refreshTokenTtl: secondsSchema,
    authorizationCodeTtl: secondsSchema,
  }),
});

/**
 * Application configuration loaded from environment
 */
export type Config = z.infer<typeof configSchema>;

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Load configuration from environment variables
 *
 * Throws a ZodError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    server: {
      port: env['PORT'] ?? '3000',
      host: env['HOST'] ?? '0.0.0.0',
      nodeEnv: env['NODE_ENV'] ?? 'development',
    },
    logging: {
      level: env['LOG_LEVEL'] ?? 'info',
    },
    tokenEndpoint: {
      path: env['TOKEN_ENDPOINT_PATH'] ?? constants.DEFAULT_TOKEN_ENDPOINT_PATH,
      responseFormat: env['TOKEN_RESPONSE_FORMAT'] ?? 'json',
      issuer: env['TOKEN_ISSUER'] ?? 'http://localhost:3000',
      jwtSigningKey: readSecret(env, 'JWT_SIGNING_KEY'),
    },
    defaults: {
      accessTokenTtl: env['ACCESS_TOKEN_TTL'] ?? constants.DEFAULT_ACCESS_TOKEN_TTL,
      refreshTokenTtl: env['REFRESH_TOKEN_TTL'] ?? constants.DEFAULT_REFRESH_TOKEN_TTL,
      authorizationCodeTtl:
        env['AUTHORIZATION_CODE_TTL'] ?? constants.DEFAULT_AUTHORIZATION_CODE_TTL,
    },
  });
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
