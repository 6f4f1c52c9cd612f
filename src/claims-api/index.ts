import { createServer } from 'http';
import { API_PREFIX } from '@shared/constants';
import { createClaimWorkflow } from '@core/index';
import { createOllamaAgents } from '@core/agents/index';
import { consoleLogger } from '@core/logger';
import { MemoryClaimRepository, type ClaimRepository } from '@core/repository';
import { createDatabase } from '@db/connection';
import { DrizzleClaimRepository } from '@db/claim-repository';
import { config } from './config';
import { createApp } from './app';

function createRepository(): { repository: ClaimRepository; close: () => Promise<void> } {
  if (config.storage === 'postgres') {
    const { db, close } = createDatabase(config.database.url);
    return { repository: new DrizzleClaimRepository(db), close };
  }
  return { repository: new MemoryClaimRepository(), close: async () => {} };
}

const { repository, close } = createRepository();
const { engine } = createClaimWorkflow({
  agents: createOllamaAgents(config.ollama),
  repository,
  agentTimeoutMs: config.agents.timeoutMs,
  logger: consoleLogger,
});

const app = createApp(engine);
const server = createServer(app);

function shutdown(signal: string) {
  console.warn(`[SERVER] ${signal} received, shutting down`);
  server.close(() => {
    close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[SERVER] Failed to close storage:', err);
        process.exit(1);
      },
    );
  });
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

server.listen(config.port, () => {
  console.warn(`[SERVER] Claim workflow API on port ${config.port} (storage: ${config.storage})`);
  console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
});

export { app, server };
