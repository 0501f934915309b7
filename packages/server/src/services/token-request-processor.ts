import type { TokenRequest, IssuedTokens } from '../types/grant.js';
import type { RequestValidator } from '../validation/request-validator.js';
import type { GrantDispatcher } from '../grants/dispatcher.js';
import type { TokenIssuer } from './token-issuer.js';
import type { Logger } from '../logging/logger.js';
import { type Result, type TokenFailure, err, storageFailure } from '../errors/result.js';
import { errorFields, silentLogger } from '../logging/logger.js';

export interface TokenRequestProcessorOptions {
  validator: RequestValidator;
  dispatcher: GrantDispatcher;
  issuer: TokenIssuer;
  logger?: Logger;
}

export type TokenOutcome = Result<IssuedTokens, TokenFailure>;

export type TokenRequestProcessor = (request: TokenRequest) => Promise<TokenOutcome>;

/**
 * Validate, extract, issue
 *
 * RECEIVED -> VALIDATED -> EXTRACTED -> ISSUED. Each step either advances or
 * returns its failure; nothing already done by an extractor is undone.
 */
export function createTokenRequestProcessor(
  options: TokenRequestProcessorOptions
): TokenRequestProcessor {
  const { validator, dispatcher, issuer } = options;
  const logger = options.logger ?? silentLogger;

  return async (request) => {
    const validated = await validator.validate(request);

    if (!validated.ok) {
      logger.warn('Token request rejected', {
        grantType: request.grantType,
        reason: validated.error.description,
      });
      return validated;
    }

    try {
      const context = await dispatcher.dispatch(validated.value);

      if (!context.ok) {
        logger.warn('Grant extraction failed', {
          grantType: validated.value.grantType,
          clientId: validated.value.service.clientId,
          reason: context.error.description,
        });
        return context;
      }

      const issued = await issuer.generate(context.value);

      if (!issued.ok) {
        logger.error('Token issuance failed', {
          grantType: context.value.grantType,
          clientId: context.value.service.clientId,
          ...errorFields(issued.error.cause),
        });
      }

      return issued;
    } catch (cause) {
      logger.error('Ticket store failure', {
        grantType: validated.value.grantType,
        ...errorFields(cause),
      });
      return err(storageFailure('Ticket store failure', cause));
    }
  };
}
