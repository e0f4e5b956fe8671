import * as dotenv from 'dotenv';
import type { Server } from 'http';
import { createApp } from './app.js';
import { loadDetectorConfig } from './config/detector.config.js';
import type { DetectorConfig } from './config/detector.config.js';
import { buildClassifier } from './config/classifierPipeline.js';
import { RateLimiter } from './services/RateLimiter.js';
import { ResultCache } from './services/ResultCache.js';
import { EventLog } from './services/EventLog.js';
import { ServingOrchestrator } from './services/ServingOrchestrator.js';
import { AverageHashFingerprinter } from './services/ai/ImageFingerprint.js';
import { formatModelIdentity } from './services/ai/ImageClassifier.js';
import { createLogger } from './utils/LoggerUtils.js';

// Load environment variables from .env.local, then .env
dotenv.config({ path: '.env.local' });
dotenv.config();

const logger = createLogger('SERVER');

const HOUR_MS = 60 * 60 * 1000;

/**
 * Builds every long-lived component once and wires them together.
 */
export async function buildOrchestrator(config: DetectorConfig): Promise<ServingOrchestrator> {
  const eventLog = await EventLog.open({
    logDirectory: config.logDirectory,
    retentionDays: config.logRetentionDays
  });

  const cache = new ResultCache({
    maxSize: config.cacheMaxSize,
    ttlSeconds: config.cacheTtlSeconds,
    fingerprinter: new AverageHashFingerprinter()
  });

  const rateLimiter = new RateLimiter({
    capacity: config.rateLimitCapacity,
    windowSeconds: config.rateLimitWindowSeconds
  });

  const classifier = buildClassifier(config.classifier);

  return new ServingOrchestrator({ rateLimiter, cache, eventLog, classifier });
}

function schedulePruning(orchestrator: ServingOrchestrator, config: DetectorConfig): NodeJS.Timeout {
  const timer = setInterval(() => {
    orchestrator.eventLog.prune(config.logRetentionDays).catch(error => {
      logger.error('Scheduled log pruning failed', error);
    });
  }, config.logPruneIntervalHours * HOUR_MS);
  timer.unref();
  return timer;
}

export async function startServer(config: DetectorConfig = loadDetectorConfig()): Promise<Server> {
  logger.info('Initializing AI Image Detector API...');

  const orchestrator = await buildOrchestrator(config);
  const app = createApp({ orchestrator, config });
  const pruneTimer = schedulePruning(orchestrator, config);

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Listening on http://${config.host}:${config.port}`, {
      model: formatModelIdentity(orchestrator.classifier.identity),
      logDirectory: orchestrator.eventLog.directory
    });
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      logger.error(`Port ${config.port} is already in use. Stop the process using it or set PORT.`);
      process.exit(1);
    }
    logger.error('Server error', err);
    throw err;
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down API...`);
    clearInterval(pruneTimer);
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}

if (require.main === module) {
  startServer().catch(error => {
    logger.error('Failed to start server', error);
    process.exit(1);
  });
}
