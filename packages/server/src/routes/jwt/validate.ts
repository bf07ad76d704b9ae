import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import type { JwtValidationResponse } from '../../types/index.js';
import type { AuthServices } from '../../container.js';
import { ERROR_INVALID_REQUEST } from '../../errors/error-codes.js';

export interface JwtValidateRouteOptions {
  services: AuthServices;
}

const validateRequestSchema = z.object({
  token: z.string().trim().min(1),
});

/**
 * POST /jwt/validate
 *
 * Answers whether a token is currently usable. Claims are never echoed back.
 */
export function createJwtValidateRoutes(options: JwtValidateRouteOptions) {
  const { services } = options;

  const router = new Hono();

  router.post(
    '/validate',
    zValidator('json', validateRequestSchema, (result, c) => {
      if (!result.success) {
        return c.json({ error: ERROR_INVALID_REQUEST, error_description: 'token is required' }, 400);
      }
    }),
    async (c) => {
      const { token } = c.req.valid('json');
      const result = await services.signer.validate(token, { checkSignature: true });

      let response: JwtValidationResponse;
      if (!result.ok) {
        response = { valid: false, expired: false };
      } else if (result.value.expired) {
        response = { valid: false, expired: true };
      } else {
        response = { valid: true, expired: false };
      }

      return c.json(response);
    }
  );

  return router;
}
