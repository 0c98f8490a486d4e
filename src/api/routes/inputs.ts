/**
 * Input Routes
 *
 * Client-side encryption of 64-bit chunks for backends that offer it.
 * The resulting handle and proof are bound to the caller and the vault.
 */

import type { FastifyInstance } from 'fastify';
import type { InputEncryptor } from '../../secret-store/types.js';
import type { Identity } from '../../types.js';
import { badRequest, callerIdentity } from '../middleware/index.js';
import { EncryptInputSchema, type CertifiedInputResponse } from '../types.js';

export interface InputRoutesOptions {
  encryptor: InputEncryptor;
  /** Identity the inputs are certified for */
  target: Identity;
}

export async function inputRoutes(
  fastify: FastifyInstance,
  options: InputRoutesOptions
): Promise<void> {
  const { encryptor, target } = options;

  /**
   * POST /v1/inputs
   * Encrypt one chunk for the vault
   */
  fastify.post<{
    Body: unknown;
    Reply: CertifiedInputResponse;
  }>('/v1/inputs', async (request, reply) => {
    const caller = callerIdentity(request);
    const { value } = EncryptInputSchema.parse(request.body);

    if (value >= 1n << 64n) {
      throw badRequest('Value must fit in 64 bits');
    }

    reply.send(encryptor.encryptInput(target, caller, value));
  });
}
