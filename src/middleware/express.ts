/**
 * jwt-session-kit - Express Middleware
 * Bearer token authentication for Express.js applications
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { TokenError, TOKEN_ERROR_MESSAGES } from '../types';
import { TokenManager } from '../tokens/token-manager';
import { TokenPayload } from '../tokens/payload';
import { createLogger, Logger } from '../logging';

const BEARER_PREFIX = 'Bearer ';

/**
 * Extend Express Request type with the verified token
 */
declare global {
  namespace Express {
    interface Request {
      /**
       * Set by `tokenAuth` / `optionalTokenAuth` once the token has passed
       * every check
       */
      token?: {
        payload: TokenPayload;
        /** The compact token as received */
        raw: string;
      };
    }
  }
}

export interface TokenAuthOptions {
  /** Manager holding the verification key and claim rules */
  manager: TokenManager;

  /**
   * Token extraction strategy
   * Defaults to `Authorization: Bearer <token>`
   */
  extractToken?: (req: Request) => string | null;

  /**
   * Failure handler
   * Defaults to a JSON body from `error.toJSON()` with `error.httpStatus`
   */
  onError?: (error: TokenError, req: Request, res: Response, next: NextFunction) => void;

  logger?: Logger;
}

/**
 * Bearer token from the Authorization header, or null when absent or not a
 * Bearer scheme.
 */
export function extractBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
    return null;
  }
  const token = authHeader.substring(BEARER_PREFIX.length).trim();
  return token.length > 0 ? token : null;
}

function defaultOnError(error: TokenError, _req: Request, res: Response, _next: NextFunction): void {
  res.status(error.httpStatus).json(error.toJSON());
}

/**
 * Mandatory authentication middleware.
 *
 * Rejects the request with the error's HTTP status when the token is missing
 * or fails any check; otherwise attaches `req.token` and continues.
 *
 * @example
 * ```typescript
 * app.use('/api', tokenAuth({ manager }));
 *
 * app.get('/api/me', (req, res) => {
 *   res.json({ sub: req.token?.payload.getSubject() });
 * });
 * ```
 */
export function tokenAuth(options: TokenAuthOptions): RequestHandler {
  const {
    manager,
    extractToken = extractBearerToken,
    onError = defaultOnError,
    logger = createLogger('middleware'),
  } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    const token = extractToken(req);

    if (!token) {
      logger.warn({ kind: 'invalid-token', path: req.path }, TOKEN_ERROR_MESSAGES.NO_TOKEN_PROVIDED);
      onError(TokenError.malformed(TOKEN_ERROR_MESSAGES.NO_TOKEN_PROVIDED), req, res, next);
      return;
    }

    const result = manager.verify(token);
    if (!result.valid) {
      logger.warn({ kind: result.error.kind, path: req.path }, result.error.message);
      onError(result.error, req, res, next);
      return;
    }

    req.token = { payload: result.payload, raw: token };
    next();
  };
}

/**
 * Optional authentication middleware.
 *
 * Attaches `req.token` when a valid token is present and always continues;
 * anonymous and rejected requests reach the handler without it.
 */
export function optionalTokenAuth(options: TokenAuthOptions): RequestHandler {
  const {
    manager,
    extractToken = extractBearerToken,
    logger = createLogger('middleware'),
  } = options;

  return (req: Request, _res: Response, next: NextFunction): void => {
    const token = extractToken(req);

    if (token) {
      const result = manager.verify(token);
      if (result.valid) {
        req.token = { payload: result.payload, raw: token };
      } else {
        logger.debug({ kind: result.error.kind, path: req.path }, 'Ignoring invalid token');
      }
    }

    next();
  };
}
