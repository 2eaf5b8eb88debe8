import { env } from './config/env';
import { logger, maskSecret } from './shared/logger';
import { createApp } from './app';
import { createSalesforceClient } from './modules/salesforce/client';

const client = createSalesforceClient({
  clientId: env.SALESFORCE_CLIENT_ID,
  clientSecret: env.SALESFORCE_CLIENT_SECRET,
  refreshToken: env.SALESFORCE_REFRESH_TOKEN,
  instanceUrl: env.SALESFORCE_INSTANCE_URL,
  apiVersion: env.SALESFORCE_API_VERSION,
  loginUrl: env.SALESFORCE_LOGIN_URL,
  timeoutMs: env.SALESFORCE_TIMEOUT_MS,
});

const app = createApp({ corsOrigins: env.CORS_ORIGINS, client });

const server = app.listen(env.PORT, () => {
  logger.info(`Server listening on port ${env.PORT}`, {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    instanceUrl: env.SALESFORCE_INSTANCE_URL,
    apiVersion: env.SALESFORCE_API_VERSION,
    clientId: maskSecret(env.SALESFORCE_CLIENT_ID),
  });
});

// Graceful shutdown: stop accepting connections, let in-flight requests finish
function shutdown(signal: string): void {
  logger.info(`Received ${signal}, shutting down gracefully`);

  server.close((err) => {
    if (err) {
      logger.error('Error while closing HTTP server', { error: err.message });
      process.exit(1);
    }
    logger.info('Shutdown complete');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
