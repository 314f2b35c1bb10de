/**
 * The mock API surface: every resource router, mounted by path.
 * Mounted by the server under /api/v1.
 */

import { Router } from 'express';
import { createAccountRoutes } from './account';
import { createDeploymentRoutes } from './deployments';
import { createApiKeyRoutes } from './keys';
import { createOrganizationRoutes } from './organizations';

export function createMockApiRouter(): Router {
  const router = Router();
  router.use('/account', createAccountRoutes());
  router.use('/deployments', createDeploymentRoutes());
  router.use('/users/auth/keys', createApiKeyRoutes());
  router.use('/organizations', createOrganizationRoutes());
  return router;
}
