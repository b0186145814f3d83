/**
 * API token authentication
 *
 * Accepts `Authorization: Bearer <token>` or the bare token.
 */

import type { FastifyRequest } from 'fastify';
import { AuthenticationError } from '../common/errors.js';

export function extractToken(header: string | undefined): string | null {
  if (!header) return null;
  return header.startsWith('Bearer ') ? header.slice('Bearer '.length) : header;
}

/**
 * Fastify preHandler hook
 * @throws AuthenticationError (401) on a missing or wrong token
 */
export function apiAuthHook(expected: string) {
  return async (req: FastifyRequest): Promise<void> => {
    const token = extractToken(req.headers.authorization);
    if (token === null) {
      throw new AuthenticationError('API key is missing');
    }
    if (token !== expected) {
      throw new AuthenticationError('Invalid API key');
    }
  };
}
