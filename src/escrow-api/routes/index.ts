import { Router } from 'express';
import type { EscrowServices } from '../services';
import healthRouter from './health';
import { rolesRouter } from './roles';
import { jobsRouter } from './jobs';

export function createApiRouter(services: EscrowServices): Router {
  const router = Router();
  router.use(healthRouter);
  router.use('/roles', rolesRouter(services));
  router.use('/jobs', jobsRouter(services));
  return router;
}
