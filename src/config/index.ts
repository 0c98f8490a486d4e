/**
 * Configuration for the vault and its HTTP server
 *
 * Shape is validated with zod; guardian-set semantics (size, duplicates,
 * threshold range) are left to GuardianRegistry so they surface as
 * RecoveryError codes.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';

// =============================================================================
// Schemas
// =============================================================================

export const VaultConfigSchema = z.object({
  guardians: z.array(z.string().trim()),
  threshold: z.coerce.number().int(),
  owner: z.string().trim().min(1),
  /** The vault's identity towards the confidential-compute backend */
  identity: z.string().trim().min(1).default('guardian-vault'),
});

export type VaultConfig = z.infer<typeof VaultConfigSchema>;

export const ServerConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(3000),
  host: z.string().default('0.0.0.0'),
  apiKeys: z.array(z.string().min(1)).default([]),
});

export type ServerSettings = z.infer<typeof ServerConfigSchema>;

export const AppConfigSchema = z.object({
  vault: VaultConfigSchema,
  server: ServerConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/** Threshold used when none is configured */
export const DEFAULT_THRESHOLD = 2;

// =============================================================================
// Loaders
// =============================================================================

/**
 * Build configuration from environment variables
 *
 * - GUARDIANS: comma-separated identities
 * - THRESHOLD: approvals required (default 2)
 * - OWNER: owner identity
 * - VAULT_IDENTITY: vault identity
 * - PORT, HOST
 * - API_KEYS: comma-separated
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return AppConfigSchema.parse({
    vault: {
      guardians: splitList(env.GUARDIANS),
      threshold: env.THRESHOLD ?? DEFAULT_THRESHOLD,
      owner: env.OWNER,
      ...(env.VAULT_IDENTITY ? { identity: env.VAULT_IDENTITY } : {}),
    },
    server: {
      ...(env.PORT ? { port: env.PORT } : {}),
      ...(env.HOST ? { host: env.HOST } : {}),
      apiKeys: splitList(env.API_KEYS),
    },
  });
}

/**
 * Read configuration from a JSON file
 */
export async function loadConfigFile(path: string): Promise<AppConfig> {
  const raw = await readFile(path, 'utf-8');
  return AppConfigSchema.parse(JSON.parse(raw));
}

function splitList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
