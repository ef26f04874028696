/**
 * Engine Config Routes
 * GET /config, PUT /config, POST /config/reset
 */

import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import type { ConfigStore } from '../../signals/config/ConfigStore';
import { parseEngineConfigOverrides } from '../../signals/config/EngineConfig';

export function createConfigRoutes(configStore: ConfigStore): Router {
  const router = Router();

  /**
   * GET /config
   * Engine configuration currently in force
   */
  router.get('/', (_req: Request, res: Response): void => {
    res.json(configStore.current());
  });

  /**
   * PUT /config
   * Merge partial options onto the current configuration.
   * Invalid options leave the current configuration in place.
   */
  router.put('/', (req: Request, res: Response, next: NextFunction): void => {
    try {
      const overrides = parseEngineConfigOverrides(req.body);
      res.json(configStore.update(overrides));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /config/reset
   * Back to default options
   */
  router.post('/reset', (_req: Request, res: Response): void => {
    console.log('[Config] Engine configuration reset to defaults');
    res.json(configStore.reset());
  });

  return router;
}
