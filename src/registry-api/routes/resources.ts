import { Router } from 'express';
import type { ResourceOperations } from '@core/resource-service';

/**
 * Mounts create / list / get / update for one resource. There is no delete.
 * Registry errors are thrown synchronously and answered by the error handler.
 */
export function createResourceRouter<T>(service: ResourceOperations<T>): Router {
  const router = Router();

  // List, narrowed by optional query filters
  router.get('/', (req, res) => {
    res.json({ success: true, data: service.list(req.query) });
  });

  router.get('/:id', (req, res) => {
    res.json({ success: true, data: service.get(req.params.id) });
  });

  router.post('/', (req, res) => {
    res.status(201).json({ success: true, data: service.create(req.body) });
  });

  // Partial update: only the fields present in the body change
  router.patch('/:id', (req, res) => {
    res.json({ success: true, data: service.update(req.params.id, req.body) });
  });

  return router;
}
