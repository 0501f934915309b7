import { serve } from '@hono/node-server';
import { createTokenServer } from './app.js';
import { getConfig } from './config/index.js';
import { createLogger } from './logging/logger.js';
import { DirectoryCallerAuthenticator } from './auth/index.js';
import {
  createMemoryTicketStore,
  MemoryServiceRegistry,
  MemoryResourceOwnerDirectory,
} from './storage/memory/index.js';

// Load configuration
const config = getConfig();
const logger = createLogger(config.logging.level, { service: 'grantline' });

const serviceRegistry = new MemoryServiceRegistry();
const directory = new MemoryResourceOwnerDirectory();

/**
 * Development client and resource owner
 * In production, back the registry and directory with your own systems
 */
const { service: devService, clientSecret: devClientSecret } = await serviceRegistry.register({
  clientId: 'dev-client',
  name: 'Development Client',
  serviceId: 'http://localhost:8080',
  redirectUris: ['http://localhost:8080/callback'],
  allowedGrants: ['authorization_code', 'refresh_token', 'password'],
  allowedScopes: ['read', 'write'],
  defaultScopes: ['read'],
});
await directory.register('demo', 'demo-password');

const app = createTokenServer({
  ticketStore: createMemoryTicketStore(),
  serviceRegistry,
  callerAuthenticator: new DirectoryCallerAuthenticator({ serviceRegistry, directory }),
  defaults: config.defaults,
  tokenEndpointPath: config.tokenEndpoint.path,
  defaultResponseFormat: config.tokenEndpoint.responseFormat,
  issuer: config.tokenEndpoint.issuer,
  jwtSigningKey: config.tokenEndpoint.jwtSigningKey,
  logger,
  enableLogging: config.server.nodeEnv !== 'test',
});

// Start server
serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info('Token endpoint listening', {
      url: `http://${info.address}:${info.port}${config.tokenEndpoint.path}`,
    });

    if (config.server.nodeEnv !== 'production') {
      // Data lives in memory and is lost on restart
      logger.info('Seeded development client', {
        clientId: devService.clientId,
        resourceOwner: 'demo',
      });

      // Startup banner only; secrets never go through the logger
      console.log('');
      console.log('Development credentials:');
      console.log(`  Client:         ${devService.clientId} / ${devClientSecret ?? '(public)'}`);
      console.log('  Resource owner: demo / demo-password');
      console.log('');
    }
  }
);
