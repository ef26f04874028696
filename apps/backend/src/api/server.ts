/**
 * Trend Alert Server
 * HTTP server and evaluation worker entry point
 */

import { createApp } from './app';
import { config } from './config';
import { initializeServices } from './init';
import { validateEnvironment } from './validateEnv';

async function start() {
  // Validate environment variables before proceeding
  try {
    validateEnvironment();
  } catch (error) {
    console.error('Environment validation failed:');
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  const { services, cleanup } = await initializeServices(config);

  const app = createApp(services);

  const server = app.listen(config.port, () => {
    console.log(`Trend alert server listening on port ${config.port}`);
    console.log(`Environment: ${config.nodeEnv}`);
    console.log(`API base URL: http://localhost:${config.port}${config.apiPrefix}`);
  });

  /**
   * Graceful shutdown
   */
  const shutdown = (signal: string): void => {
    console.log(`${signal} received, shutting down gracefully...`);
    server.close(() => {
      console.log('Server closed');
      cleanup()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Cleanup failed:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}

// Start server
start().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
