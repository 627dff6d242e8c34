/**
 * API Middleware: authentication and error handling.
 */

import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { TypedError, apiError, createTypedError, isTransferError, unauthenticatedError, validationError } from '../domain/errors';
import { logger } from '../logger';

export interface BasicAuthCredentials {
  username: string;
  password: string;
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

/** Decode an `Authorization: Basic` header into its user and password. */
export function parseBasicAuth(header: string | undefined): BasicAuthCredentials | null {
  if (!header) return null;
  const match = /^Basic\s+(\S+)$/i.exec(header.trim());
  if (!match) return null;
  const decoded = Buffer.from(match[1], 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator < 0) return null;
  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

/**
 * HTTP Basic authentication. Without configured credentials every request
 * passes through.
 */
export function basicAuth(credentials?: BasicAuthCredentials): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!credentials) {
      next();
      return;
    }

    const supplied = parseBasicAuth(req.headers.authorization);
    const userOk = supplied !== null && safeEqual(supplied.username, credentials.username);
    const passwordOk = supplied !== null && safeEqual(supplied.password, credentials.password);
    if (!userOk || !passwordOk) {
      res.setHeader('WWW-Authenticate', 'Basic realm="argo-cordra-connector"');
      res.status(401).json(apiError(unauthenticatedError('Authentication required')));
      return;
    }

    next();
  };
}

/** Express body-parser errors carry an HTTP status and a machine type. */
function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    'type' in err &&
    typeof err.type === 'string'
  );
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (isTransferError(err)) {
    const status = getHttpStatus(err.typedError);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  if (isBodyParserError(err) && err.status < 500) {
    logger.warn('Malformed request body', { type: err.type, status: err.status });
    res.status(400).json(apiError(validationError(`Malformed request body: ${err.message}`, { type: err.type })));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  logger.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message,
        retryable: false,
      }),
    ),
  );
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.startsWith('AUTH.UNAUTHENTICATED')) return 401;
  if (error.code.startsWith('AUTH.')) return 403;
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.endsWith('.UNAVAILABLE')) return 503;
  return 500;
}
