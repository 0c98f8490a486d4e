/**
 * API Types for the vault REST API
 *
 * Request and response schemas for all API endpoints
 */

import { z } from 'zod';
import type { RecoveryPhase } from '../recovery/types.js';

// =============================================================================
// Request Schemas
// =============================================================================

/**
 * Schema for storing or rotating the secret
 */
export const IngestSecretSchema = z.object({
  chunks: z.array(z.string()),
  proofs: z.array(z.string()),
});

export type IngestSecretRequest = z.infer<typeof IngestSecretSchema>;

/**
 * Schema for an owner grant or a recovery proposal
 */
export const IdentitySchema = z.object({
  identity: z.string(),
});

export type IdentityRequest = z.infer<typeof IdentitySchema>;

/**
 * Schema for the request id path parameter
 */
export const RequestIdParamsSchema = z.object({
  id: z.coerce.number().int().nonnegative(),
});

/**
 * Schema for encrypting a 64-bit input (decimal or 0x-hex string)
 */
export const EncryptInputSchema = z.object({
  value: z
    .union([
      z.string().regex(/^(0x[0-9a-fA-F]+|\d+)$/, 'Expected a decimal or 0x-hex integer'),
      z.number().int().nonnegative(),
    ])
    .transform((value) => BigInt(value)),
});

export type EncryptInputRequest = z.input<typeof EncryptInputSchema>;

// =============================================================================
// Response Types
// =============================================================================

export interface SecretResponse {
  version: number;
  chunks: string[];
}

export interface VersionResponse {
  version: number;
}

export interface GuardiansResponse {
  guardians: string[];
  threshold: number;
}

export interface GuardianCheckResponse {
  identity: string;
  isGuardian: boolean;
}

export interface ApprovalCheckResponse {
  identity: string;
  hasApproved: boolean;
}

export interface RecoveryStatusResponse {
  phase: RecoveryPhase;
  description: string;
  id: number;
  proposedIdentity: string | null;
  approvalCount: number;
  threshold: number;
  executed: boolean;
  createdAt: string | null;
}

export interface ProposalResponse {
  id: number;
}

export interface ApprovalResponse {
  id: number;
  approvalCount: number;
  executed: boolean;
}

export interface CertifiedInputResponse {
  handle: string;
  proof: string;
}

export interface AuditResponse {
  valid: boolean;
  entries: Array<{
    sequence: number;
    eventType: string;
    actor: string;
    timestamp: string;
    data: Record<string, unknown>;
    hash: string;
  }>;
}

/**
 * Health check response
 */
export interface HealthResponse {
  status: 'healthy';
  version: string;
  /** Whether the owner has stored a secret yet */
  secretStored: boolean;
  recovery: RecoveryPhase;
  timestamp: string;
}

/**
 * Error response
 */
export interface ErrorResponse {
  error: {
    message: string;
    code?: string;
    statusCode: number;
  };
}
