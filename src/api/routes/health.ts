/**
 * Health route, open to unauthenticated callers
 */

import type { FastifyInstance } from 'fastify';
import type { AccessController } from '../../vault/index.js';
import type { HealthResponse } from '../types.js';

export const API_VERSION = '0.1.0';

export interface HealthRoutesOptions {
  vault: AccessController;
}

export async function healthRoutes(
  fastify: FastifyInstance,
  { vault }: HealthRoutesOptions
): Promise<void> {
  fastify.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
    reply.send({
      status: 'healthy',
      version: API_VERSION,
      secretStored: vault.secretVersion > 0,
      recovery: vault.status().phase,
      timestamp: new Date().toISOString(),
    });
  });
}
