/**
 * Guardian Vault REST API Server
 *
 * Fastify-based REST API over an AccessController
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { loadConfigFile, loadConfigFromEnv, type AppConfig } from '../config/index.js';
import { InMemoryConfidentialCompute } from '../secret-store/memory-compute.js';
import type { InputEncryptor } from '../secret-store/types.js';
import { AccessController, FixedOwner } from '../vault/index.js';
import { errorHandler, createApiKeyAuth } from './middleware/index.js';
import { healthRoutes, vaultRoutes, inputRoutes, API_VERSION } from './routes/index.js';

export interface ServerConfig {
  /** Vault served by this instance */
  vault: AccessController;

  /** Exposes POST /v1/inputs when set */
  encryptor?: InputEncryptor;

  /** Port to listen on */
  port?: number;

  /** Host to bind to */
  host?: string;

  /** Enable CORS */
  enableCors?: boolean;

  /** Enable rate limiting */
  enableRateLimit?: boolean;

  /** Enable API key authentication */
  enableAuth?: boolean;

  /** Accepted API keys */
  apiKeys?: string[];

  /** Fastify logger configuration */
  logger?: FastifyServerOptions['logger'];
}

/**
 * Create and configure Fastify server
 */
export async function createServer(config: ServerConfig): Promise<FastifyInstance> {
  const {
    vault,
    encryptor,
    enableCors = true,
    enableRateLimit = true,
    enableAuth = true,
    apiKeys = [],
    logger = true,
  } = config;

  // Create Fastify instance
  const fastify = Fastify({
    logger,
    ajv: {
      customOptions: {
        removeAdditional: 'all',
        coerceTypes: true,
        useDefaults: true,
      },
    },
  });

  // Register error handler
  fastify.setErrorHandler(errorHandler);

  // Register CORS plugin
  if (enableCors) {
    await fastify.register(cors, {
      origin: true,
      credentials: true,
    });
  }

  // Register rate limiting
  if (enableRateLimit) {
    await fastify.register(rateLimit, {
      max: 100,
      timeWindow: '1 minute',
      errorResponseBuilder: () => ({
        error: {
          message: 'Rate limit exceeded. Please try again later.',
          code: 'RATE_LIMIT_EXCEEDED',
          statusCode: 429,
        },
      }),
    });
  }

  // Register authentication hook
  if (enableAuth) {
    fastify.addHook('onRequest', createApiKeyAuth(apiKeys));
  }

  // Register routes
  await fastify.register(healthRoutes, { vault });
  await fastify.register(vaultRoutes, { vault });
  if (encryptor) {
    await fastify.register(inputRoutes, { encryptor, target: vault.identity });
  }

  // Root endpoint
  fastify.get('/', async (_request, reply) => {
    reply.send({
      name: 'Guardian Vault API',
      version: API_VERSION,
      description: 'Guardian threshold recovery for versioned secrets',
      endpoints: {
        health: 'GET /health',
        secret: {
          get: 'GET /v1/secret',
          store: 'PUT /v1/secret',
          rotate: 'POST /v1/secret/rotate',
          grant: 'POST /v1/grants',
        },
        guardians: {
          list: 'GET /v1/guardians',
          check: 'GET /v1/guardians/:identity',
        },
        recovery: {
          status: 'GET /v1/recovery',
          propose: 'POST /v1/recovery',
          approve: 'POST /v1/recovery/:id/approvals',
          hasApproved: 'GET /v1/recovery/approvals/:identity',
        },
        audit: 'GET /v1/audit',
        ...(encryptor && { inputs: 'POST /v1/inputs' }),
      },
      documentation: 'Use X-API-Key for authentication and X-Identity for the caller',
    });
  });

  return fastify;
}

/**
 * Build a vault backed by the in-memory confidential-compute backend
 */
export function createInMemoryVault(config: AppConfig): {
  vault: AccessController;
  compute: InMemoryConfidentialCompute;
} {
  const compute = new InMemoryConfidentialCompute();
  const vault = new AccessController({
    guardians: config.vault.guardians,
    threshold: config.vault.threshold,
    owner: new FixedOwner(config.vault.owner),
    compute,
    identity: config.vault.identity,
  });
  return { vault, compute };
}

/**
 * Start the server
 */
export async function startServer(config: ServerConfig): Promise<FastifyInstance> {
  const { port = 3000, host = '0.0.0.0' } = config;

  const fastify = await createServer(config);

  try {
    await fastify.listen({ port, host });
    return fastify;
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

// Start server if running directly
if (import.meta.url === `file://${process.argv[1]}`) {
  const configPath = process.env.VAULT_CONFIG;

  Promise.resolve()
    .then(() => (configPath ? loadConfigFile(configPath) : loadConfigFromEnv()))
    .then(async (appConfig) => {
      const { vault, compute } = createInMemoryVault(appConfig);
      const server = await startServer({
        vault,
        encryptor: compute,
        port: appConfig.server.port,
        host: appConfig.server.host,
        apiKeys: appConfig.server.apiKeys,
      });
      server.log.info(
        { guardians: vault.getGuardians().length, threshold: vault.threshold },
        'Guardian Vault API ready'
      );
    })
    .catch((err: unknown) => {
      console.error('Failed to start server:', err);
      process.exit(1);
    });
}
