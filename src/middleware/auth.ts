import { Request, ErrorRequestHandler } from 'express';
import { UnauthorizedError } from 'express-oauth2-jwt-bearer';
import { checkJwt } from '../config/auth0';

/**
 * JWT validation middleware for the administrative routes
 * Validates the access token and attaches the claims to req.auth
 */
export const requireAuth = checkJwt;

/**
 * Subject of the validated access token
 */
export const getUserId = (req: Request): string | null => req.auth?.payload.sub ?? null;

/**
 * Error handler for auth errors (missing, malformed or rejected bearer tokens)
 */
export const authErrorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (err instanceof UnauthorizedError) {
    res.status(err.status).set(err.headers).json({
      error: err.status === 403 ? 'Forbidden' : 'Unauthorized',
      message: err.status === 403 ? err.message : 'Invalid or expired access token',
    });
    return;
  }
  next(err);
};
