import type { Server } from 'http';
import express from 'express';
import { getConfig, isPaperTrading } from './config/index.js';
import { createEngine } from './engine.js';
import { createHealthRouter } from './api/routes/health.js';
import { createReplicationRouter } from './api/routes/replication.js';
import { createCallsRouter } from './api/routes/calls.js';
import { errorMessage } from './utils/errors.js';
import { initializeFileLogging } from './utils/fileLogger.js';
import { logger, shortAddress } from './utils/logger.js';
import { getContentType, getMetrics } from './utils/metrics.js';

const log = logger('Main');

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  log.info('Starting position replication engine');

  const config = getConfig();
  if (config.logging.fileLoggingEnabled) {
    initializeFileLogging(config.logging.directory);
  }

  log.info('Configuration loaded', {
    env: config.env,
    network: config.hyperliquid.network,
    paperTrading: isPaperTrading(),
    target: config.replication.targetAddress ? shortAddress(config.replication.targetAddress) : null,
    sizingMode: config.replication.sizingMode,
    marginModePolicy: config.replication.marginModePolicy,
    ledger: config.callLedger.directory,
  });

  const engine = await createEngine(config);
  const { controller, ledger, governor } = engine;

  await controller.start();

  // Status API
  let server: Server | null = null;
  if (config.api.enabled) {
    const app = express();
    app.use(express.json());

    if (config.api.enableMetrics) {
      app.get('/metrics', async (_req, res) => {
        try {
          const metrics = await getMetrics();
          res.set('Content-Type', getContentType());
          res.send(metrics);
        } catch (error) {
          res.status(500).send(`Error collecting metrics: ${errorMessage(error)}`);
        }
      });
    }

    app.use('/health', createHealthRouter({ controller, governor, paperTrading: isPaperTrading() }));
    app.use('/api/replication', createReplicationRouter(controller));
    app.use('/api/calls', createCallsRouter({ ledger, governor }));

    server = app.listen(config.api.port, () => {
      log.info(`API server listening on port ${config.api.port}`);
    });
  }

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info(`Received ${signal}, shutting down...`);

    try {
      await controller.stop();
      server?.close();
      log.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      log.error('Error during shutdown', { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  log.info(`Paper trading mode: ${isPaperTrading() ? 'ENABLED' : 'DISABLED - LIVE TRADING'}`);
  if (!isPaperTrading()) {
    log.warn('WARNING: Live trading is enabled. Real money is at risk!');
  }
}

main().catch((error: unknown) => {
  log.error('Fatal error', { error: errorMessage(error) });
  process.exit(1);
});
