/**
 * Scan Routes
 *
 * Public endpoints hit by phone cameras. `/p/*` is the main (customer)
 * path and `/m/*` the management (owner) path; the route alone decides
 * which lookup an identifier goes through.
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import type { PacketCore } from '../../services/index.js';
import type { ScanPath } from '../../types/index.js';
import { NotFoundError, withRetry } from '../../utils/errors.js';
import { logger, maskIdentifier } from '../../utils/logger.js';
import { parseRequest } from '../middleware.js';

export interface ScanRouterOptions {
  /** Attempts for a configuration submission that loses a write race */
  staleRetryAttempts: number;
}

const configureSchema = z.object({
  destination: z.string().min(1, 'Enter a valid phone number or URL').max(4096),
});

export function createScanRouter(core: PacketCore, options: ScanRouterOptions): Router {
  const router = Router();

  // Targets change after reconfiguration; nothing here may be cached
  router.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Cache-Control', 'no-store');
    next();
  });

  const resolve = (path: ScanPath) => async (req: Request, res: Response, next: NextFunction) => {
    try {
      const identifier = req.params.identifier ?? '';
      const outcome = await core.resolver.resolve(identifier, path);

      switch (outcome.kind) {
        case 'REDIRECT':
          res.redirect(302, outcome.target);
          return;
        case 'ERROR_NOT_READY':
          next(new NotFoundError());
          return;
        default:
          res.json(outcome);
      }
    } catch (error) {
      next(error);
    }
  };

  const configure = (path: ScanPath) => async (req: Request, res: Response, next: NextFunction) => {
    try {
      const identifier = req.params.identifier ?? '';
      const body = parseRequest(configureSchema, req.body);

      const result = await withRetry(
        () => core.applier.apply(identifier, path, body.destination),
        { maxAttempts: options.staleRetryAttempts },
        'configure'
      );

      logger.info(
        {
          path,
          identifier: path === 'main' ? identifier : maskIdentifier(identifier),
          changed: result.changed,
        },
        'Destination submitted'
      );

      res.json({
        success: true,
        state: result.packet.state,
        target: result.target,
        changed: result.changed,
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /p/:identifier
   * Customer scan: redirect once configured
   */
  router.get('/p/:identifier', resolve('main'));

  /**
   * GET /p/:identifier/status
   * Configured-or-not probe for the public id
   */
  router.get('/p/:identifier/status', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const status = await core.resolver.status(req.params.identifier ?? '');
      if (!status) {
        throw new NotFoundError();
      }
      res.json(status);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /p/:identifier/configure
   * First configuration from the customer code
   */
  router.post('/p/:identifier/configure', configure('main'));

  /**
   * GET /m/:identifier
   * Owner scan: always a form, never a redirect
   */
  router.get('/m/:identifier', resolve('management'));

  /**
   * POST /m/:identifier/configure
   * Configuration or reconfiguration from the owner code
   */
  router.post('/m/:identifier/configure', configure('management'));

  return router;
}
