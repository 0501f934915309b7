import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { ResponseFormat } from '@grantline/shared';
import type { TokenEndpointEnv } from './types/hono.js';
import type {
  ITicketStore,
  IServiceRegistry,
  ICallerAuthenticator,
} from './storage/interfaces/index.js';
import type { Logger } from './logging/logger.js';
import { silentLogger } from './logging/logger.js';
import { oauthErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { createTokenRoutes } from './routes/oauth/index.js';
import { RequestValidator } from './validation/request-validator.js';
import {
  GrantDispatcher,
  createAuthorizationCodeExtractor,
  createRefreshTokenExtractor,
  createPasswordExtractor,
} from './grants/index.js';
import { TokenIssuer } from './services/token-issuer.js';
import { ExpirationPolicy, type ExpirationDefaults } from './services/expiration-policy.js';
import { createTokenRequestProcessor } from './services/token-request-processor.js';
import { createAccessTokenSigner } from './crypto/jwt.js';
import {
  DEFAULT_ACCESS_TOKEN_TTL,
  DEFAULT_REFRESH_TOKEN_TTL,
  DEFAULT_AUTHORIZATION_CODE_TTL,
  DEFAULT_TOKEN_ENDPOINT_PATH,
} from './config/constants.js';

export interface TokenServerOptions {
  ticketStore: ITicketStore;
  serviceRegistry: IServiceRegistry;
  callerAuthenticator: ICallerAuthenticator;
  /**
   * Token lifetimes in seconds, overridable per registered service
   */
  defaults?: Partial<ExpirationDefaults>;
  tokenEndpointPath?: string;
  /**
   * Response format when the Accept header names neither JSON nor text
   */
  defaultResponseFormat?: ResponseFormat;
  /**
   * `iss` claim of JWT access tokens
   */
  issuer?: string;
  /**
   * HS256 secret; required for services with `jwtAccessToken` set
   */
  jwtSigningKey?: string;
  logger?: Logger;
  enableCors?: boolean;
  enableLogging?: boolean;
}

/**
 * Create the token endpoint application
 */
export function createTokenServer(options: TokenServerOptions): Hono<TokenEndpointEnv> {
  const {
    ticketStore,
    serviceRegistry,
    callerAuthenticator,
    defaults = {},
    tokenEndpointPath = DEFAULT_TOKEN_ENDPOINT_PATH,
    defaultResponseFormat = 'json',
    issuer = 'http://localhost:3000',
    jwtSigningKey,
    logger = silentLogger,
    enableCors = true,
    enableLogging = true,
  } = options;

  const expirationPolicy = new ExpirationPolicy({
    accessTokenTtl: defaults.accessTokenTtl ?? DEFAULT_ACCESS_TOKEN_TTL,
    refreshTokenTtl: defaults.refreshTokenTtl ?? DEFAULT_REFRESH_TOKEN_TTL,
    authorizationCodeTtl: defaults.authorizationCodeTtl ?? DEFAULT_AUTHORIZATION_CODE_TTL,
  });

  const endpointLogger = logger.child({ component: 'token-endpoint' });

  const processRequest = createTokenRequestProcessor({
    validator: new RequestValidator(serviceRegistry),
    dispatcher: new GrantDispatcher({
      authorization_code: createAuthorizationCodeExtractor({
        authorizationCodeStorage: ticketStore.authorizationCodes,
        logger: endpointLogger,
      }),
      refresh_token: createRefreshTokenExtractor({
        refreshTokenStorage: ticketStore.refreshTokens,
      }),
      password: createPasswordExtractor({ callerAuthenticator }),
    }),
    issuer: new TokenIssuer({
      ticketStore,
      expirationPolicy,
      issuer,
      signAccessToken: jwtSigningKey ? createAccessTokenSigner(jwtSigningKey) : undefined,
      logger: endpointLogger,
    }),
    logger: endpointLogger,
  });

  const app = new Hono<TokenEndpointEnv>();

  // Global error handler
  app.onError(oauthErrorHandler(logger));

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger(logger));
  }

  // CORS (needed for token endpoint from SPAs)
  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type', 'Accept'],
        maxAge: 86400,
      })
    );
  }

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route(
    tokenEndpointPath,
    createTokenRoutes({
      processRequest,
      callerAuthenticator,
      defaultResponseFormat,
      logger: endpointLogger,
    })
  );

  return app;
}
