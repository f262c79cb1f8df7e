/**
 * Court case fetcher service
 *
 * Components:
 * - Search engine (court-playwright) with a human-in-the-loop CAPTCHA
 * - Persistence on libsql (SQLite file or remote)
 * - HTTP API (Express)
 */

import 'dotenv/config';
import { createHighCourtSearch } from 'court-playwright';
import { loadConfig } from './config.js';
import { startApiServer } from './api/server.js';
import { LibsqlSearchStore } from './services/case-store.js';
import { CaseSearchService } from './services/search.js';
import { componentLogger, logger, setLogLevel } from './utils/logger.js';

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  logger.info('Starting court fetcher...', { env: config.env });

  const store = await LibsqlSearchStore.open({
    url: config.database.url,
    authToken: config.database.authToken,
    logger: componentLogger('store'),
  });

  if (config.database.retentionDays > 0) {
    const pruned = await store.pruneFailedAttempts(config.database.retentionDays);
    logger.info(`Pruned ${pruned} old failed search(es)`);
  }

  const { orchestrator, sessions } = createHighCourtSearch({
    store,
    searchUrl: new URL('get-case-type-status', config.court.baseUrl).href,
    session: {
      headless: config.court.headless,
      navigationTimeout: config.court.navigationTimeout,
    },
    search: config.search,
    logger: componentLogger('engine'),
  });

  const service = new CaseSearchService({
    orchestrator,
    store,
    probeBrowser: () => sessions.probe(),
    maxConcurrent: config.search.maxConcurrent,
    courtBaseUrl: config.court.baseUrl,
    pdfTimeoutMs: config.court.pdfTimeout,
  });

  const server = await startApiServer(service, {
    port: config.port,
    corsOrigins: config.corsOrigins,
    exposeErrors: config.env === 'development',
  });

  logger.info('='.repeat(50));
  logger.info('Court fetcher started');
  logger.info(`API HTTP: http://localhost:${config.port}/api`);
  logger.info(`Court: ${config.court.baseUrl}`);
  logger.info('='.repeat(50));

  // Graceful shutdown
  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down...');
    server.close();
    await service.shutdown();
    store.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((error) => {
  logger.error('Failed to start the service', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
