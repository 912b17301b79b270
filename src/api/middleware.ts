/**
 * API middleware — request logging and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import {
  EngineError,
  TypedError,
  apiError,
  createTypedError,
  errorMessage,
  isRecord,
  maskSecretsInMessage,
} from '../domain/errors';
import { logger } from '../logger';

/** Map a typed error code to an HTTP status. */
export function getHttpStatus(error: Pick<TypedError, 'code'>): number {
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.endsWith('NOT_FOUND')) return 404;
  if (error.code === 'RUN.ADMISSION_REJECTED') return 429;
  return 500;
}

/** Log each request once it has been answered. */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      logger.debug('Request handled', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });
    next();
  };
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && isRecord(err) && err.type === 'entity.parse.failed';
}

/** Unmatched routes under the API prefix. */
export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json(
    apiError(
      createTypedError({
        code: 'ROUTE.NOT_FOUND',
        message: `No route for ${req.method} ${req.path}`,
      }),
    ),
  );
}

/**
 * Global error handler. Typed errors keep their code; anything else is an
 * internal error. Known secret values never reach the response.
 */
export function createErrorHandler(secrets: readonly string[] = []) {
  const mask = (message: string) => maskSecretsInMessage(message, secrets);

  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof EngineError) {
      const typedError = { ...err.typedError, message: mask(err.typedError.message) };
      const status = getHttpStatus(typedError);
      logger.warn('Request error', { code: typedError.code, status });
      res.status(status).json(apiError(typedError));
      return;
    }

    if (isBodyParseError(err)) {
      res.status(400).json(
        apiError(
          createTypedError({
            code: 'VALIDATION.BODY',
            message: 'Request body is not valid JSON',
          }),
        ),
      );
      return;
    }

    const message = mask(errorMessage(err));
    logger.error('Unhandled request error', {
      message,
      stack: err instanceof Error ? err.stack : undefined,
    });
    res.status(500).json(
      apiError(
        createTypedError({
          code: 'SYSTEM.INTERNAL',
          message: message || 'Internal server error',
        }),
      ),
    );
  };
}
