/**
 * Account API routes.
 *
 * GET /account: The caller's account and its trust settings.
 */

import { Router } from 'express';
import { Account, mockAccount } from '../domain/account';
import { HandlerResult, ok } from '../domain/errors';
import { sendResult } from './respond';

export function getAccount(): HandlerResult<Account> {
  return ok(mockAccount());
}

export function createAccountRoutes(): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    sendResult(res, getAccount());
  });

  return router;
}
