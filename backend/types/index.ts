/**
 * Core type definitions for the AI Image Detector service
 */

// Classification types
export type Decision = 'ai' | 'real' | 'uncertain' | 'error';

export const DECISIONS: readonly Decision[] = ['ai', 'real', 'uncertain', 'error'];

export interface ClassProbabilities {
  fake: number;
  real: number;
}

export interface ClassificationResult {
  decision: Decision;
  confidence: number;
  classProbabilities: ClassProbabilities;
  /** Model that produced the verdict; a cached result keeps its original producer */
  modelIdentity: ModelIdentity;
  detail?: string;
}

export interface ModelIdentity {
  name: string;
  version: string;
}

// Image types
export interface DecodedImage {
  /** EXIF-rotated pixels re-encoded as PNG */
  buffer: Buffer;
  width: number;
  height: number;
  format: string;
}

export interface ImageDecoder {
  decode(bytes: Buffer): Promise<DecodedImage>;
}

export interface ImageFingerprinter {
  fingerprint(image: DecodedImage): Promise<string>;
}

export interface ImageClassifier {
  readonly identity: ModelIdentity;
  analyze(image: DecodedImage): Promise<ClassificationResult>;
}

// Persisted log record (one JSON object per line, additive-only)
export interface LogRecordResult {
  decision: Decision;
  isAi: boolean;
  confidence: number;
  fakeProbability: number;
  realProbability: number;
}

export interface LogRecord {
  schemaVersion: 1;
  timestamp: string;
  requestId: string;
  fingerprint: string;
  sourceUrl: string;
  imageUrl: string | null;
  clientId: string;
  result: LogRecordResult;
  processingTimeMs: number;
  model: ModelIdentity;
  cacheHit: boolean;
  error?: string;
}

// Request / response envelope
export interface AnalyzeInput {
  image: Buffer;
  sourceUrl: string;
  imageUrl?: string;
  clientId: string;
}

export interface AnalyzeResponse {
  requestId: string;
  decision: Decision;
  isAi: boolean;
  confidence: number;
  fakeProbability: number;
  realProbability: number;
  fingerprint: string;
  processingTimeMs: number;
  cached: boolean;
  model: ModelIdentity;
  remaining: number;
}

export interface RateLimitedOutcome {
  status: 'rate_limited';
  limit: number;
  remaining: number;
  resetSeconds: number;
}

export interface AnalyzedOutcome {
  status: 'ok';
  response: AnalyzeResponse;
}

export type ServeOutcome = RateLimitedOutcome | AnalyzedOutcome;

// Statistics
export interface CacheStats {
  size: number;
  capacity: number;
  ttlSeconds: number;
  hits: number;
  misses: number;
  hitRate: number;
}

export interface LogStats {
  total: number;
  positiveDecisions: number;
  cacheHits: number;
  cacheHitRate: number;
  decisions: Record<Decision, number>;
  partitions: number;
}

export type Clock = () => number;
