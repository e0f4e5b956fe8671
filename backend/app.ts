import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import * as fs from 'fs';
import * as path from 'path';
import type { DetectorConfig } from './config/detector.config.js';
import type { ServingOrchestrator } from './services/ServingOrchestrator.js';
import { formatModelIdentity } from './services/ai/ImageClassifier.js';
import { createAnalyzeRouter } from './routes/analyzeRouter.js';
import { createStatsRouter } from './routes/statsRouter.js';
import { ErrorHandler } from './utils/errorHandler.js';
import { createLogger } from './utils/LoggerUtils.js';

const logger = createLogger('SERVER');

export const VERSION = '1.0.0';

export interface AppDeps {
  orchestrator: ServingOrchestrator;
  config: DetectorConfig;
  apiSpecPath?: string;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function findApiSpec(explicitPath?: string): string | undefined {
  const candidates = explicitPath
    ? [explicitPath]
    : [path.join(__dirname, 'api-spec.json'), path.join(process.cwd(), 'backend', 'api-spec.json')];
  return candidates.find(candidate => fs.existsSync(candidate));
}

export function createApp({ orchestrator, config, apiSpecPath }: AppDeps) {
  const app = express();
  const startedAt = Date.now();

  // Client identity comes from X-Forwarded-For behind one proxy hop
  app.set('trust proxy', 1);

  app.use(helmet());

  app.use(cors({
    origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    exposedHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset', 'Retry-After']
  }));

  // Base64 inflates images by a third
  const bodyLimit = `${Math.ceil(config.maxImageSizeMB * 4 / 3) + 1}mb`;
  app.use(express.json({ limit: bodyLimit }));
  app.use(express.urlencoded({ extended: true, limit: bodyLimit }));

  const specPath = findApiSpec(apiSpecPath);
  if (specPath) {
    try {
      const apiSpec: unknown = JSON.parse(fs.readFileSync(specPath, 'utf8'));
      if (isJsonObject(apiSpec)) {
        app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(apiSpec, {
          customSiteTitle: 'AI Image Detector API Documentation',
          swaggerOptions: { displayRequestDuration: true, docExpansion: 'list' }
        }));
      }
    } catch (error) {
      logger.error('Failed to setup Swagger UI', error);
    }
  } else {
    logger.warn('API spec not found, /api-docs disabled');
  }

  app.use('/api/analyze', createAnalyzeRouter(orchestrator, config.maxImageSizeMB));
  app.use('/api', createStatsRouter(orchestrator));

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'healthy',
      model: formatModelIdentity(orchestrator.classifier.identity),
      version: VERSION,
      uptimeSeconds: Math.round((Date.now() - startedAt) / 1000),
      timestamp: new Date().toISOString()
    });
  });

  app.get('/api', (_req, res) => {
    res.json({
      name: 'AI Image Detector API',
      version: VERSION,
      description: 'Rate-limited, cached and audited AI-generated image detection',
      endpoints: {
        analyze: 'POST /api/analyze',
        stats: 'GET /api/stats',
        recent: 'GET /api/logs/recent',
        clearCache: 'DELETE /api/cache',
        health: 'GET /health',
        docs: '/api-docs'
      }
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ success: false, error: 'NOT_FOUND', message: 'Route not found' });
  });

  // Error handling middleware
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = ErrorHandler.toHttpPayload(err, process.env.NODE_ENV === 'development');
    if (status >= 500) {
      logger.error(body.message, err);
    }
    res.status(status).json(body);
  });

  return app;
}
