/**
 * Serving Orchestrator
 * admit -> decode -> fingerprint -> cache lookup -> (miss) classify -> cache store -> log -> respond
 */

import { performance } from 'perf_hooks';
import { v4 as uuidv4 } from 'uuid';
import type {
  AnalyzeInput,
  ClassificationResult,
  Clock,
  ImageClassifier,
  ImageDecoder,
  LogRecord,
  ServeOutcome
} from '../types/index.js';
import type { RateLimiter } from './RateLimiter.js';
import type { ResultCache } from './ResultCache.js';
import type { EventLog } from './EventLog.js';
import { errorResult } from './ai/ImageClassifier.js';
import { SharpImageDecoder } from './ai/ImageUtils.js';
import { createLogger } from '../utils/LoggerUtils.js';

const logger = createLogger('ORCHESTRATOR');

export interface ServingOrchestratorDeps {
  rateLimiter: RateLimiter;
  cache: ResultCache<ClassificationResult>;
  eventLog: EventLog;
  classifier: ImageClassifier;
  decoder?: ImageDecoder;
  now?: Clock;
  generateRequestId?: () => string;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class ServingOrchestrator {
  readonly rateLimiter: RateLimiter;
  readonly cache: ResultCache<ClassificationResult>;
  readonly eventLog: EventLog;
  readonly classifier: ImageClassifier;
  private readonly decoder: ImageDecoder;
  private readonly now: Clock;
  private readonly generateRequestId: () => string;

  constructor(deps: ServingOrchestratorDeps) {
    this.rateLimiter = deps.rateLimiter;
    this.cache = deps.cache;
    this.eventLog = deps.eventLog;
    this.classifier = deps.classifier;
    this.decoder = deps.decoder ?? new SharpImageDecoder();
    this.now = deps.now ?? Date.now;
    this.generateRequestId = deps.generateRequestId ?? (() => uuidv4());
  }

  /**
   * Serves one analysis request.
   *
   * Rate-limited requests stop at admission: nothing is decoded, cached or logged.
   * Every admitted request that gets a verdict, cached or not, is logged exactly once.
   * Undecodable images reject with BadImageError; log write failures reject with EventLogWriteError.
   */
  async handle(input: AnalyzeInput): Promise<ServeOutcome> {
    const { clientId } = input;

    if (!this.rateLimiter.admit(clientId)) {
      return {
        status: 'rate_limited',
        limit: this.rateLimiter.limit,
        remaining: this.rateLimiter.remaining(clientId),
        resetSeconds: this.rateLimiter.resetEta(clientId)
      };
    }

    const requestId = this.generateRequestId();
    const image = await this.decoder.decode(input.image);
    const fingerprint = await this.cache.fingerprint(image);

    const cached = this.cache.lookup(fingerprint);
    const cacheHit = cached !== undefined;

    let result: ClassificationResult;
    let processingTimeMs = 0;

    if (cached !== undefined) {
      result = cached;
    } else {
      const start = performance.now();
      try {
        result = await this.classifier.analyze(image);
      } catch (error) {
        logger.error(`Classifier failed for request ${requestId}`, error);
        result = errorResult(this.classifier.identity, error);
      }
      processingTimeMs = round2(performance.now() - start);

      // A failure must not be served again from cache
      if (result.decision !== 'error') {
        this.cache.store(fingerprint, result);
      }
    }

    const record: LogRecord = {
      schemaVersion: 1,
      timestamp: new Date(this.now()).toISOString(),
      requestId,
      fingerprint,
      sourceUrl: input.sourceUrl,
      imageUrl: input.imageUrl ?? null,
      clientId,
      result: {
        decision: result.decision,
        isAi: result.decision === 'ai',
        confidence: result.confidence,
        fakeProbability: result.classProbabilities.fake,
        realProbability: result.classProbabilities.real
      },
      processingTimeMs,
      model: result.modelIdentity,
      cacheHit
    };
    if (result.decision === 'error' && result.detail) {
      record.error = result.detail;
    }

    await this.eventLog.append(record);

    logger.info(`Analysis logged: ${requestId} - ${result.decision} (${processingTimeMs.toFixed(1)}ms, cache_hit=${cacheHit})`);

    return {
      status: 'ok',
      response: {
        requestId,
        decision: result.decision,
        isAi: record.result.isAi,
        confidence: result.confidence,
        fakeProbability: result.classProbabilities.fake,
        realProbability: result.classProbabilities.real,
        fingerprint,
        processingTimeMs,
        cached: cacheHit,
        model: result.modelIdentity,
        remaining: this.rateLimiter.remaining(clientId)
      }
    };
  }
}
