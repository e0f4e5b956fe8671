import axios from 'axios';
import type { AxiosRequestConfig } from 'axios';
import type {
  ClassificationResult,
  ClassProbabilities,
  DecodedImage,
  ImageClassifier,
  ModelIdentity
} from '../../types/index.js';
import { ClassifierError, ErrorHandler } from '../../utils/errorHandler.js';
import { createLogger } from '../../utils/LoggerUtils.js';

export const DEFAULT_VERDICT_THRESHOLD = 0.6;

export function formatModelIdentity(identity: ModelIdentity): string {
  return `${identity.name}@${identity.version}`;
}

/**
 * Turns class probabilities into a verdict.
 * A class wins only when it clears the threshold; otherwise the verdict is uncertain.
 */
export function deriveVerdict(
  probabilities: ClassProbabilities,
  modelIdentity: ModelIdentity,
  threshold: number = DEFAULT_VERDICT_THRESHOLD
): ClassificationResult {
  const { fake, real } = probabilities;

  if (fake > threshold) {
    return { decision: 'ai', confidence: fake, classProbabilities: { fake, real }, modelIdentity };
  }
  if (real > threshold) {
    return { decision: 'real', confidence: real, classProbabilities: { fake, real }, modelIdentity };
  }
  return { decision: 'uncertain', confidence: Math.max(fake, real), classProbabilities: { fake, real }, modelIdentity };
}

/**
 * A failed inference is its own verdict. It is never reported as "real".
 */
export function errorResult(identity: ModelIdentity, error: unknown): ClassificationResult {
  return {
    decision: 'error',
    confidence: 0,
    classProbabilities: { fake: 0, real: 0 },
    modelIdentity: identity,
    detail: ErrorHandler.describe(error)
  };
}

export interface HttpResponse {
  status: number;
  data: unknown;
}

export type HttpPost = (url: string, body: unknown, config: AxiosRequestConfig) => Promise<HttpResponse>;

export const axiosPost: HttpPost = (url, body, config) => axios.post<unknown>(url, body, config);

export interface HttpClassifierOptions {
  endpoint: string;
  timeoutMs: number;
  maxRetries?: number;
  post?: HttpPost;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Base for classifiers reached over HTTP: bounded request time, and retries with
 * backoff on 429, 5xx and network failures. Anything else fails the call.
 */
export abstract class HttpClassifier implements ImageClassifier {
  abstract readonly identity: ModelIdentity;

  protected readonly endpoint: string;
  protected readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly post: HttpPost;
  private readonly sleep: (ms: number) => Promise<void>;
  protected readonly logger = createLogger('CLASSIFIER');

  protected constructor(options: HttpClassifierOptions) {
    this.endpoint = options.endpoint;
    this.timeoutMs = options.timeoutMs;
    this.maxRetries = options.maxRetries ?? 3;
    this.post = options.post ?? axiosPost;
    this.sleep = options.sleep ?? defaultSleep;
  }

  abstract analyze(image: DecodedImage): Promise<ClassificationResult>;

  protected async postWithBackoff(body: unknown, headers: Record<string, string>, attempt = 1): Promise<unknown> {
    let response: HttpResponse;
    try {
      response = await this.post(this.endpoint, body, {
        headers,
        timeout: this.timeoutMs,
        validateStatus: () => true
      });
    } catch (error) {
      const info = ErrorHandler.analyzeError(error);
      if (info.retryable && attempt <= this.maxRetries) {
        return this.retry(body, headers, attempt, ErrorHandler.describe(error));
      }
      throw new ClassifierError(`Classifier request failed: ${ErrorHandler.describe(error)}`, { cause: error });
    }

    if (response.status >= 200 && response.status < 300) {
      return response.data;
    }

    const info = ErrorHandler.analyzeError(`HTTP ${response.status}`, response.status);
    if (info.retryable && attempt <= this.maxRetries) {
      return this.retry(body, headers, attempt, `HTTP ${response.status}`);
    }
    throw new ClassifierError(`Classifier responded with HTTP ${response.status}`, { httpStatus: response.status });
  }

  private async retry(body: unknown, headers: Record<string, string>, attempt: number, reason: string): Promise<unknown> {
    const delay = ErrorHandler.backoffDelay(attempt);
    this.logger.warn(`${reason}, retrying in ${delay}ms (attempt ${attempt}/${this.maxRetries})`);
    await this.sleep(delay);
    return this.postWithBackoff(body, headers, attempt + 1);
  }
}
