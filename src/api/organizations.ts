/**
 * Organization API routes.
 *
 * GET /organizations: List organizations (always a single page).
 */

import { Router } from 'express';
import { OrganizationListResponse, mockOrganizations } from '../domain/organization';
import { HandlerResult, ok } from '../domain/errors';
import { sendResult } from './respond';

export function listOrganizations(): HandlerResult<OrganizationListResponse> {
  return ok({ organizations: mockOrganizations(), next_page: null });
}

export function createOrganizationRoutes(): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    sendResult(res, listOrganizations());
  });

  return router;
}
