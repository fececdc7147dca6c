/**
 * Lead Gateway entry point
 *
 * Loads .env, builds the services and starts the HTTP server.
 */

import 'dotenv/config';
import logger from './config/logger';
import { SERVICE_NAME, SERVICE_VERSION } from './config/constants';
import { loadConfig } from './config/env';
import { SqliteIdentityStore } from './services/database.service';
import { createGatewayApp, createGatewayDependencies } from './servers/gateway.server';

const startServer = (): void => {
  const config = loadConfig();
  const deps = createGatewayDependencies(config);
  const app = createGatewayApp(deps);

  const server = app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        store: deps.store.kind,
        contactLookup: config.contactLookup,
        workflowWebhook: deps.publisher.enabled,
        zohoAuth: deps.zohoTokens.authMode,
      },
      `Lead gateway started on port ${config.port}`
    );

    const unsigned = Object.entries(config.secrets)
      .filter(([, secret]) => !secret)
      .map(([source]) => source);
    if (unsigned.length > 0) {
      logger.warn({ sources: unsigned }, 'Webhook secrets not set; signatures from these sources are not checked');
    }
    if (!config.apiKey) {
      logger.warn('MCP_API_KEY not set; the tool API is open');
    }
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');

    server.close((error) => {
      if (deps.store instanceof SqliteIdentityStore) {
        deps.store.close();
      }
      if (error) {
        logger.error({ error: error.message }, 'Server closed with error');
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

if (require.main === module) {
  startServer();
}

export { startServer };
