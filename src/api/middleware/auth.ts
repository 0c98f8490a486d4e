/**
 * Authentication Middleware
 *
 * API key check for every route but /health, and extraction of the caller
 * principal. The principal in X-Identity is expected to be set by an
 * authenticating gateway in front of this service.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Identity } from '../../types.js';
import { unauthorized } from './error-handler.js';

export const API_KEY_HEADER = 'x-api-key';
export const IDENTITY_HEADER = 'x-identity';

/**
 * Build an API key authentication hook
 *
 * @param apiKeys - Accepted keys
 */
export function createApiKeyAuth(
  apiKeys: Iterable<string>
): (request: FastifyRequest, reply: FastifyReply) => Promise<void> {
  const validKeys = new Set(apiKeys);

  return async function authenticateApiKey(
    request: FastifyRequest,
    _reply: FastifyReply
  ): Promise<void> {
    // Skip authentication for health check
    if (request.url === '/health') {
      return;
    }

    const apiKey = request.headers[API_KEY_HEADER];

    if (!apiKey) {
      throw unauthorized('API key required. Provide X-API-Key header.');
    }

    if (typeof apiKey !== 'string' || !validKeys.has(apiKey)) {
      throw unauthorized('Invalid API key');
    }
  };
}

/**
 * Read the calling principal
 *
 * @throws {ApiError} 401 when the header is missing
 */
export function callerIdentity(request: FastifyRequest): Identity {
  const identity = request.headers[IDENTITY_HEADER];

  if (typeof identity !== 'string' || identity.trim().length === 0) {
    throw unauthorized('Caller identity required. Provide X-Identity header.');
  }

  return identity.trim();
}
