/**
 * Guardian Vault REST API Tests
 *
 * Integration tests for the REST API endpoints
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { joinSecret, splitSecret } from '../secret-store/chunks.js';
import type { InMemoryConfidentialCompute } from '../secret-store/memory-compute.js';
import { createInMemoryVault, createServer } from './server.js';

const API_KEY = 'test-api-key';
const OWNER = 'owner';
const G1 = 'guardian-1';
const G2 = 'guardian-2';
const G3 = 'guardian-3';
const RECOVERY = 'recovery';
const SECRET = '0x1f2e3d4c5b6a79880011223344556677a1b2c3d4e5f60718293a4b5c6d7e8f90';

describe('Guardian Vault REST API', () => {
  let server: FastifyInstance;
  let compute: InMemoryConfidentialCompute;

  beforeEach(async () => {
    const built = createInMemoryVault({
      vault: { guardians: [G1, G2, G3], threshold: 2, owner: OWNER, identity: 'vault' },
      server: { port: 0, host: '127.0.0.1', apiKeys: [API_KEY] },
    });
    compute = built.compute;
    server = await createServer({
      vault: built.vault,
      encryptor: built.compute,
      logger: false,
      enableRateLimit: false,
      apiKeys: [API_KEY],
    });
  });

  afterEach(async () => {
    await server.close();
  });

  function headers(identity?: string): Record<string, string> {
    return identity ? { 'x-api-key': API_KEY, 'x-identity': identity } : { 'x-api-key': API_KEY };
  }

  async function encryptSecret(secret: string): Promise<{ chunks: string[]; proofs: string[] }> {
    const chunks: string[] = [];
    const proofs: string[] = [];
    for (const chunk of splitSecret(secret)) {
      const response = await server.inject({
        method: 'POST',
        url: '/v1/inputs',
        headers: headers(OWNER),
        payload: { value: '0x' + chunk.toString(16) },
      });
      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      chunks.push(body.handle);
      proofs.push(body.proof);
    }
    return { chunks, proofs };
  }

  async function storeSecret(secret: string): Promise<void> {
    const response = await server.inject({
      method: 'PUT',
      url: '/v1/secret',
      headers: headers(OWNER),
      payload: await encryptSecret(secret),
    });
    expect(response.statusCode).toBe(200);
  }

  async function approve(guardian: string, id: number) {
    return server.inject({
      method: 'POST',
      url: `/v1/recovery/${id}/approvals`,
      headers: headers(guardian),
    });
  }

  describe('Authentication', () => {
    it('should serve the health check without a key', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('healthy');
      expect(body.version).toBe('0.1.0');
      expect(body.secretStored).toBe(false);
      expect(body.recovery).toBe('EMPTY');
    });

    it('should report the stored secret and recovery phase', async () => {
      await storeSecret(SECRET);
      await server.inject({
        method: 'POST',
        url: '/v1/recovery',
        headers: headers(G1),
        payload: { identity: RECOVERY },
      });

      const response = await server.inject({ method: 'GET', url: '/health' });
      const body = JSON.parse(response.body);

      expect(body.secretStored).toBe(true);
      expect(body.recovery).toBe('PENDING');
    });

    it('should require an API key elsewhere', async () => {
      const response = await server.inject({ method: 'GET', url: '/v1/guardians' });

      expect(response.statusCode).toBe(401);
      expect(JSON.parse(response.body).error.code).toBe('UNAUTHORIZED');
    });

    it('should reject an unknown API key', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/v1/guardians',
        headers: { 'x-api-key': 'wrong-key' },
      });

      expect(response.statusCode).toBe(401);
      expect(JSON.parse(response.body).error.message).toBe('Invalid API key');
    });

    it('should require a caller identity for mutations', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/v1/recovery',
        headers: headers(),
        payload: { identity: RECOVERY },
      });

      expect(response.statusCode).toBe(401);
    });
  });

  describe('Root Endpoint', () => {
    it('should return API information', async () => {
      const response = await server.inject({ method: 'GET', url: '/', headers: headers() });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.name).toBe('Guardian Vault API');
      expect(body.endpoints.inputs).toBe('POST /v1/inputs');
    });
  });

  describe('Guardians', () => {
    it('should list the committee and threshold', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/v1/guardians',
        headers: headers(),
      });

      expect(JSON.parse(response.body)).toEqual({ guardians: [G1, G2, G3], threshold: 2 });
    });

    it('should check membership', async () => {
      const member = await server.inject({
        method: 'GET',
        url: `/v1/guardians/${G1}`,
        headers: headers(),
      });
      const stranger = await server.inject({
        method: 'GET',
        url: `/v1/guardians/${OWNER}`,
        headers: headers(),
      });

      expect(JSON.parse(member.body)).toEqual({ identity: G1, isGuardian: true });
      expect(JSON.parse(stranger.body)).toEqual({ identity: OWNER, isGuardian: false });
    });
  });

  describe('Secret', () => {
    it('should start empty', async () => {
      const response = await server.inject({ method: 'GET', url: '/v1/secret', headers: headers() });

      const body = JSON.parse(response.body);
      expect(body.version).toBe(0);
      expect(body.chunks).toEqual(Array(4).fill('0x' + '0'.repeat(64)));
    });

    it('should store and rotate with increasing versions', async () => {
      const first = await server.inject({
        method: 'PUT',
        url: '/v1/secret',
        headers: headers(OWNER),
        payload: await encryptSecret(SECRET),
      });
      expect(JSON.parse(first.body)).toEqual({ version: 1 });

      const second = await server.inject({
        method: 'POST',
        url: '/v1/secret/rotate',
        headers: headers(OWNER),
        payload: await encryptSecret(SECRET),
      });
      expect(JSON.parse(second.body)).toEqual({ version: 2 });
    });

    it('should reject non-owners with 403', async () => {
      const payload = await encryptSecret(SECRET);
      const response = await server.inject({
        method: 'PUT',
        url: '/v1/secret',
        headers: headers(G1),
        payload,
      });

      expect(response.statusCode).toBe(403);
      expect(JSON.parse(response.body).error.code).toBe('NOT_OWNER');
    });

    it('should reject the wrong number of proofs', async () => {
      const { chunks, proofs } = await encryptSecret(SECRET);
      const response = await server.inject({
        method: 'PUT',
        url: '/v1/secret',
        headers: headers(OWNER),
        payload: { chunks, proofs: proofs.slice(0, 2) },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.code).toBe('INVALID_PROOF_COUNT');
    });

    it('should reject a body without proofs', async () => {
      const response = await server.inject({
        method: 'PUT',
        url: '/v1/secret',
        headers: headers(OWNER),
        payload: { chunks: [] },
      });

      expect(response.statusCode).toBe(400);
    });

    it('should let the owner grant access directly', async () => {
      await storeSecret(SECRET);

      const response = await server.inject({
        method: 'POST',
        url: '/v1/grants',
        headers: headers(OWNER),
        payload: { identity: 'auditor' },
      });

      expect(response.statusCode).toBe(204);
    });

    it('should refuse grants before a secret exists', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/v1/grants',
        headers: headers(OWNER),
        payload: { identity: 'auditor' },
      });

      expect(response.statusCode).toBe(409);
      expect(JSON.parse(response.body).error.code).toBe('NO_SECRET_STORED');
    });
  });

  describe('Inputs', () => {
    it('should reject values wider than 64 bits', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/v1/inputs',
        headers: headers(OWNER),
        payload: { value: '18446744073709551616' },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.code).toBe('BAD_REQUEST');
    });

    it('should reject values that are not integers', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/v1/inputs',
        headers: headers(OWNER),
        payload: { value: 'forty-two' },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('Recovery', () => {
    it('should run a recovery through to the grant', async () => {
      await storeSecret(SECRET);

      const proposed = await server.inject({
        method: 'POST',
        url: '/v1/recovery',
        headers: headers(G1),
        payload: { identity: RECOVERY },
      });
      expect(proposed.statusCode).toBe(201);
      expect(JSON.parse(proposed.body)).toEqual({ id: 1 });

      const first = await approve(G1, 1);
      expect(JSON.parse(first.body)).toEqual({ id: 1, approvalCount: 1, executed: false });

      const pending = await server.inject({ method: 'GET', url: '/v1/recovery', headers: headers() });
      const status = JSON.parse(pending.body);
      expect(status.phase).toBe('PENDING');
      expect(status.description).toBe('Collecting guardian approvals');
      expect(status.proposedIdentity).toBe(RECOVERY);
      expect(status.threshold).toBe(2);

      const voted = await server.inject({
        method: 'GET',
        url: `/v1/recovery/approvals/${G1}`,
        headers: headers(),
      });
      expect(JSON.parse(voted.body)).toEqual({ identity: G1, hasApproved: true });

      const second = await approve(G2, 1);
      expect(JSON.parse(second.body)).toEqual({ id: 1, approvalCount: 2, executed: true });

      const secret = await server.inject({ method: 'GET', url: '/v1/secret', headers: headers() });
      const { chunks } = JSON.parse(secret.body);
      const values = chunks.map((chunk: string) => compute.userDecrypt(chunk, RECOVERY));
      expect(joinSecret(values)).toBe(SECRET);

      const late = await approve(G3, 1);
      expect(late.statusCode).toBe(409);
      expect(JSON.parse(late.body).error.code).toBe('ALREADY_EXECUTED');
    });

    it('should reject proposals from non-guardians', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/v1/recovery',
        headers: headers(OWNER),
        payload: { identity: RECOVERY },
      });

      expect(response.statusCode).toBe(403);
      expect(JSON.parse(response.body).error.code).toBe('NOT_A_GUARDIAN');
    });

    it('should map state conflicts to 409', async () => {
      const none = await approve(G1, 1);
      expect(none.statusCode).toBe(409);
      expect(JSON.parse(none.body).error.code).toBe('NO_ACTIVE_REQUEST');

      await server.inject({
        method: 'POST',
        url: '/v1/recovery',
        headers: headers(G1),
        payload: { identity: RECOVERY },
      });

      const stale = await approve(G1, 7);
      expect(JSON.parse(stale.body).error.code).toBe('STALE_OR_UNKNOWN_REQUEST');

      const duplicate = await server.inject({
        method: 'POST',
        url: '/v1/recovery',
        headers: headers(G2),
        payload: { identity: RECOVERY },
      });
      expect(duplicate.statusCode).toBe(409);
      expect(JSON.parse(duplicate.body).error.code).toBe('DUPLICATE_PROPOSAL');
    });

    it('should reject a non-numeric request id', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/v1/recovery/latest/approvals',
        headers: headers(G1),
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('Audit', () => {
    it('should return a verifiable trail', async () => {
      await storeSecret(SECRET);
      await server.inject({
        method: 'POST',
        url: '/v1/recovery',
        headers: headers(G1),
        payload: { identity: RECOVERY },
      });

      const response = await server.inject({ method: 'GET', url: '/v1/audit', headers: headers() });
      const body = JSON.parse(response.body);

      expect(body.valid).toBe(true);
      expect(body.entries.map((e: { eventType: string }) => e.eventType)).toEqual([
        'SECRET_STORED',
        'RECOVERY_PROPOSED',
      ]);
      expect(body.entries[1].data).toEqual({ id: 1, proposedIdentity: RECOVERY });
    });
  });
});
