import { Router } from 'express';
import type { Registry } from '@core/registry';
import { RESOURCE_PATHS, SERVICE_NAME, SERVICE_VERSION } from '@shared/constants';
import healthRouter from './health';
import { createResourceRouter } from './resources';

export function createApiRouter(registry: Registry): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      success: true,
      data: {
        message: `Welcome to the ${SERVICE_NAME}`,
        version: SERVICE_VERSION,
        endpoints: {
          health: '/health',
          persons: RESOURCE_PATHS.PERSONS,
          addresses: RESOURCE_PATHS.ADDRESSES,
          organizations: RESOURCE_PATHS.ORGANIZATIONS,
          courses: RESOURCE_PATHS.COURSES,
        },
      },
    });
  });

  router.use(healthRouter);
  router.use(RESOURCE_PATHS.ADDRESSES, createResourceRouter(registry.addresses));
  router.use(RESOURCE_PATHS.PERSONS, createResourceRouter(registry.persons));
  router.use(RESOURCE_PATHS.ORGANIZATIONS, createResourceRouter(registry.organizations));
  router.use(RESOURCE_PATHS.COURSES, createResourceRouter(registry.courses));

  return router;
}
