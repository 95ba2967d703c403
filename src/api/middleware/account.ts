/**
 * Account Middleware
 * Loads the caller's account (with lazy downgrade applied) before any
 * handler looks at plans or quotas
 */

import type { Context, Next } from 'hono';

import type { AccountService } from '../../services/account.service.js';
import { errorResponse } from '../utils/response.js';

export function createAccountMiddleware(deps: {
  accountService: Pick<AccountService, 'loadAccount'>;
}) {
  const { accountService } = deps;

  return async function accountMiddleware(c: Context, next: Next) {
    const actor = c.get('actor');
    const requestId = c.get('requestId');

    if (actor.userId === undefined) {
      return c.json(
        {
          error: {
            code: 'UNAUTHORIZED',
            message: 'Authentication required',
            requestId,
          },
        },
        401
      );
    }

    const result = await accountService.loadAccount(actor, actor.userId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    c.set('account', result.data);
    await next();
  };
}
