/**
 * Vault Routes
 *
 * Owner operations on the secret, guardian recovery operations, and the
 * public views.
 */

import type { FastifyInstance } from 'fastify';
import { getPhaseDescription } from '../../recovery/state-machine.js';
import type { AccessController } from '../../vault/index.js';
import { callerIdentity } from '../middleware/index.js';
import {
  IdentitySchema,
  IngestSecretSchema,
  RequestIdParamsSchema,
  type ApprovalCheckResponse,
  type ApprovalResponse,
  type AuditResponse,
  type GuardianCheckResponse,
  type GuardiansResponse,
  type ProposalResponse,
  type RecoveryStatusResponse,
  type SecretResponse,
  type VersionResponse,
} from '../types.js';

export interface VaultRoutesOptions {
  vault: AccessController;
}

const ingestBodySchema = {
  type: 'object',
  required: ['chunks', 'proofs'],
  properties: {
    chunks: { type: 'array', items: { type: 'string' } },
    proofs: { type: 'array', items: { type: 'string' } },
  },
};

const identityBodySchema = {
  type: 'object',
  required: ['identity'],
  properties: {
    identity: { type: 'string' },
  },
};

export async function vaultRoutes(
  fastify: FastifyInstance,
  options: VaultRoutesOptions
): Promise<void> {
  const { vault } = options;

  // ===========================================================================
  // Secret
  // ===========================================================================

  /**
   * GET /v1/secret
   * Current opaque chunk handles and version
   */
  fastify.get<{
    Reply: SecretResponse;
  }>('/v1/secret', async (_request, reply) => {
    reply.send({
      version: vault.secretVersion,
      chunks: [...vault.getSecret()],
    });
  });

  /**
   * PUT /v1/secret
   * Store or overwrite the secret (owner only)
   */
  fastify.put<{
    Body: unknown;
    Reply: VersionResponse;
  }>('/v1/secret', {
    schema: {
      body: ingestBodySchema,
    },
  }, async (request, reply) => {
    const caller = callerIdentity(request);
    const body = IngestSecretSchema.parse(request.body);

    const version = vault.storeSecret(caller, body.chunks, body.proofs);
    request.log.info({ version }, 'secret stored');

    reply.send({ version });
  });

  /**
   * POST /v1/secret/rotate
   * Replace the secret and discard any recovery request (owner only)
   */
  fastify.post<{
    Body: unknown;
    Reply: VersionResponse;
  }>('/v1/secret/rotate', {
    schema: {
      body: ingestBodySchema,
    },
  }, async (request, reply) => {
    const caller = callerIdentity(request);
    const body = IngestSecretSchema.parse(request.body);

    const version = vault.rotateSecret(caller, body.chunks, body.proofs);
    request.log.info({ version }, 'secret rotated');

    reply.send({ version });
  });

  /**
   * POST /v1/grants
   * Grant read access directly, bypassing guardians (owner only)
   */
  fastify.post<{
    Body: unknown;
  }>('/v1/grants', {
    schema: {
      body: identityBodySchema,
    },
  }, async (request, reply) => {
    const caller = callerIdentity(request);
    const body = IdentitySchema.parse(request.body);

    vault.grantDecryptionRights(caller, body.identity);
    request.log.info({ grantee: body.identity }, 'access granted by owner');

    reply.status(204).send();
  });

  // ===========================================================================
  // Guardians
  // ===========================================================================

  fastify.get<{
    Reply: GuardiansResponse;
  }>('/v1/guardians', async (_request, reply) => {
    reply.send({
      guardians: vault.getGuardians(),
      threshold: vault.threshold,
    });
  });

  fastify.get<{
    Params: { identity: string };
    Reply: GuardianCheckResponse;
  }>('/v1/guardians/:identity', async (request, reply) => {
    const { identity } = request.params;
    reply.send({ identity, isGuardian: vault.isGuardian(identity) });
  });

  // ===========================================================================
  // Recovery
  // ===========================================================================

  /**
   * GET /v1/recovery
   * Status of the current request
   */
  fastify.get<{
    Reply: RecoveryStatusResponse;
  }>('/v1/recovery', async (_request, reply) => {
    const status = vault.status();
    reply.send({
      phase: status.phase,
      description: getPhaseDescription(status.phase),
      id: status.id,
      proposedIdentity: status.proposedIdentity,
      approvalCount: status.approvalCount,
      threshold: vault.threshold,
      executed: status.executed,
      createdAt: status.createdAt ? status.createdAt.toISOString() : null,
    });
  });

  /**
   * POST /v1/recovery
   * Propose a recovery identity (guardian only)
   */
  fastify.post<{
    Body: unknown;
    Reply: ProposalResponse;
  }>('/v1/recovery', {
    schema: {
      body: identityBodySchema,
    },
  }, async (request, reply) => {
    const caller = callerIdentity(request);
    const body = IdentitySchema.parse(request.body);

    const id = vault.proposeRecovery(caller, body.identity);
    request.log.info({ id, proposedIdentity: body.identity }, 'recovery proposed');

    reply.status(201).send({ id });
  });

  /**
   * POST /v1/recovery/:id/approvals
   * Approve the current request (guardian only)
   */
  fastify.post<{
    Params: { id: string };
    Reply: ApprovalResponse;
  }>('/v1/recovery/:id/approvals', async (request, reply) => {
    const caller = callerIdentity(request);
    const { id } = RequestIdParamsSchema.parse(request.params);

    const result = vault.approveRecovery(caller, id);
    if (result.justExecuted) {
      request.log.info(
        { id, grantee: result.request.proposedIdentity },
        'recovery threshold reached, access granted'
      );
    }

    reply.send({
      id,
      approvalCount: result.approvalCount,
      executed: result.justExecuted,
    });
  });

  fastify.get<{
    Params: { identity: string };
    Reply: ApprovalCheckResponse;
  }>('/v1/recovery/approvals/:identity', async (request, reply) => {
    const { identity } = request.params;
    reply.send({ identity, hasApproved: vault.hasApproved(identity) });
  });

  // ===========================================================================
  // Audit
  // ===========================================================================

  fastify.get<{
    Reply: AuditResponse;
  }>('/v1/audit', async (_request, reply) => {
    const trail = vault.getAuditTrail();
    reply.send({
      valid: trail.verify().valid,
      entries: trail.getEntries().map((entry) => ({
        sequence: entry.sequence,
        eventType: entry.eventType,
        actor: entry.actor,
        timestamp: entry.timestamp.toISOString(),
        data: entry.data,
        hash: entry.hash,
      })),
    });
  });
}
