import { buildApp } from './api/index.js';
import { config } from './config/index.js';
import { createConfiguredAnalyzer, type DomainAnalyzer } from './services/domain-analyzer/index.js';
import { DomainStore } from './services/domain-store/index.js';
import { DomainWorker } from './services/worker/index.js';
import { logger } from './lib/logger.js';

export interface ServiceContainer {
  store: DomainStore;
  analyzer: DomainAnalyzer;
}

async function main() {
  // 1. Open the domain store
  const store = await DomainStore.open({ filePath: config.storeFile });

  // 2. Initialize services
  const analyzer = createConfiguredAnalyzer();
  const container: ServiceContainer = { store, analyzer };

  // 3. Start the background worker
  const worker = new DomainWorker(store, analyzer, {
    intervalMs: config.worker.intervalMs,
    includeAnalyzed: config.worker.includeAnalyzed,
  });
  if (config.worker.enabled) worker.start();

  // 4. Start API server
  const app = await buildApp(container);
  await app.listen({ port: config.apiPort, host: '0.0.0.0' });
  logger.info({ port: config.apiPort, ruleSet: config.ruleSet }, 'Company Lookup API started');

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    await worker.stop();
    await app.close();
    await store.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((error) => {
  logger.fatal({ error }, 'Failed to start');
  process.exit(1);
});
