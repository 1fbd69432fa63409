/**
 * Application Entry Point
 *
 * Loads configuration, builds the application context and starts the Hono
 * server. SIGINT/SIGTERM drain running tasks and flush memory before exit.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/index.js';
import { ConfigError, loadConfig } from './config/index.js';
import type { CoreConfig } from './config/index.js';
import { createAppContext } from './context/app-context.js';

function readConfig(): CoreConfig {
  try {
    return loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();
const context = await createAppContext(config);

const app = createApp({
  services: {
    orchestrator: context.orchestrator,
    registry: context.registry,
    memory: context.memory,
    commands: context.commands,
    audit: context.auditService,
  },
  allowedOrigins: config.allowedOrigins,
});

console.error(`Server starting on port ${config.port}`);
console.error(
  `Embeddings: ${context.embedder.model} (${context.embedder.dimensions}d), ` +
    `persistence: ${config.supabase ? 'supabase' : 'in-memory'}`
);

const server = serve({
  fetch: app.fetch,
  port: config.port,
});

let stopping = false;

async function stop(signal: string): Promise<void> {
  if (stopping) {
    return;
  }
  stopping = true;
  console.error(`${signal} received, draining tasks`);
  server.close();
  await context.dispose();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    stop(signal).catch((error: unknown) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  });
}

export { app };
