/**
 * Express application factory with dependency injection.
 *
 * Middleware order:
 * 1. Request correlation id
 * 2. JSON body parser
 * 3. Access routes under /api/access
 * 4. Not-found fallback
 * 5. Global error handling
 *
 * @module app
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';

import { ACCESS_ERROR_CODES, isAccessControlError } from './access/errors.js';
import { createAccessRouter, type AccessRouterDependencies } from './http/accessRouter.js';
import {
  formatAccessError,
  formatErrorResponse,
  formatInternalError,
  generateRequestId,
  getHttpStatusForError,
} from './http/responses.js';
import { createSilentLogger, type Logger } from './logging/logger.js';

export const REQUEST_ID_HEADER = 'x-request-id';

export interface AppDependencies extends AccessRouterDependencies {
  logger?: Logger;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function requestIdOf(res: Response): string {
  const id: unknown = res.locals['requestId'];
  return typeof id === 'string' ? id : generateRequestId();
}

/** body-parser marks unparseable JSON with this type. */
function isMalformedBody(err: unknown): boolean {
  return err instanceof SyntaxError && Reflect.get(err, 'type') === 'entity.parse.failed';
}

// ─── Application Factory ─────────────────────────────────────────────────────

export function createApp(deps: AppDependencies): express.Express {
  const logger = (deps.logger ?? createSilentLogger()).child({ component: 'http' });
  const app = express();

  app.disable('x-powered-by');

  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.get(REQUEST_ID_HEADER) ?? generateRequestId();
    res.locals['requestId'] = requestId;
    res.set(REQUEST_ID_HEADER, requestId);
    next();
  });

  app.use(express.json());

  app.use('/api/access', createAccessRouter(deps));

  app.use((_req: Request, res: Response) => {
    const body = formatErrorResponse(
      ACCESS_ERROR_CODES.NOT_FOUND,
      'Route not found',
      requestIdOf(res),
    );
    res.status(404).json(body);
  });

  // ── Global Error Handler ──────────────────────────────────────────────

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = requestIdOf(res);

    if (isAccessControlError(err)) {
      const status = getHttpStatusForError(err.code);
      logger.debug('Request rejected', {
        requestId,
        path: req.path,
        code: err.code,
        status,
      });
      res.status(status).json(formatAccessError(err, requestId));
      return;
    }

    if (isMalformedBody(err)) {
      const body = formatErrorResponse(
        ACCESS_ERROR_CODES.INVALID_INPUT,
        'Malformed JSON body',
        requestId,
        { body: ['must be valid JSON'] },
      );
      res.status(400).json(body);
      return;
    }

    logger.error('Unhandled error', err, { requestId, path: req.path });
    res.status(500).json(formatInternalError(requestId));
  });

  return app;
}
