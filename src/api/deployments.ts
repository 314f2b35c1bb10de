/**
 * Deployment API routes.
 *
 * GET /deployments: List deployments
 * POST /deployments: Create a deployment
 * POST /deployments/_search: Search deployments (the query is not evaluated)
 */

import { Router } from 'express';
import {
  CreateDeploymentResponse,
  DeploymentListResponse,
  DeploymentSearchResponse,
  emptyResourceBreakdown,
  mockDeployments,
  mockElasticsearchResource,
} from '../domain/deployment';
import {
  HandlerResult,
  ok,
  badRequest,
  INVALID_JSON_MESSAGE,
  DEPLOYMENT_NAME_REQUIRED_MESSAGE,
} from '../domain/errors';
import { deploymentId } from '../domain/identifiers';
import { optionalString, parseJsonPayload, readField, stringifyField } from '../domain/payload';
import { logger } from '../logger';
import { rawBody, sendResult } from './respond';

const log = logger.child({ routes: 'deployments' });

export function listDeployments(): HandlerResult<DeploymentListResponse> {
  return ok({ deployments: mockDeployments() });
}

/**
 * Create a deployment from `{ name, alias? }`.
 *
 * `name` may be any non-null JSON value whose text form is non-empty; the id
 * is derived from it. A non-string `alias` is dropped.
 */
export function createDeployment(body: string): HandlerResult<CreateDeploymentResponse> {
  const parsed = parseJsonPayload(body);
  if (!parsed.ok) {
    return badRequest(INVALID_JSON_MESSAGE);
  }

  const name = stringifyField(readField(parsed.value, 'name'));
  if (!name) {
    return badRequest(DEPLOYMENT_NAME_REQUIRED_MESSAGE);
  }

  const deployment: CreateDeploymentResponse = {
    id: deploymentId(name),
    name,
    alias: optionalString(parsed.value, 'alias') ?? null,
    created: true,
    resources: [mockElasticsearchResource()],
  };
  log.info('Deployment created', { deploymentId: deployment.id });

  return ok(deployment);
}

/** Any valid JSON body yields the same two hits. */
export function searchDeployments(body: string): HandlerResult<DeploymentSearchResponse> {
  if (!parseJsonPayload(body).ok) {
    return badRequest(INVALID_JSON_MESSAGE);
  }

  const deployments = mockDeployments().map((d) => ({
    id: d.id,
    name: d.name,
    healthy: false,
    resources: emptyResourceBreakdown(),
  }));

  return ok({
    returnCount: deployments.length,
    matchCount: deployments.length,
    deployments,
  });
}

export function createDeploymentRoutes(): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    sendResult(res, listDeployments());
  });

  router.post('/', (req, res) => {
    sendResult(res, createDeployment(rawBody(req)));
  });

  router.post('/_search', (req, res) => {
    sendResult(res, searchDeployments(rawBody(req)));
  });

  return router;
}
