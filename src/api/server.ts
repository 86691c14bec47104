/**
 * API Server
 *
 * Starts the Hono application on Node.js with @hono/node-server.
 *
 * Usage:
 *   npm run server
 *
 * Environment Variables:
 *   PORT - Port to listen on (default: 3000)
 *   HOST - Interface to bind (default: 0.0.0.0)
 *   See src/config.ts for the engine settings.
 */

import { serve } from '@hono/node-server';
import { config, validateConfig } from '../config';
import { createRuntime } from '../bootstrap';
import { createApp } from './app';

async function startServer(): Promise<void> {
  validateConfig(config);

  const runtime = await createRuntime(config);
  const app = createApp(runtime);

  const server = serve({ fetch: app.fetch, port: config.server.port, hostname: config.server.host }, (info) => {
    console.log(`[Server] Listening on http://${info.address}:${info.port} (${config.server.nodeEnv})`);
    console.log(`[Server]   Health: http://localhost:${info.port}/health`);
    console.log(`[Server]   API:    http://localhost:${info.port}/api`);
  });

  const shutdown = (signal: string) => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    server.close((error) => {
      if (error) {
        console.error('[Server] Error while closing:', error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
