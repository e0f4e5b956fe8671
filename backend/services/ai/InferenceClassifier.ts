/**
 * Inference Classifier
 * Sends the normalised image to a model-serving endpoint that answers with label scores,
 * e.g. [{ "label": "fake", "score": 0.93 }, { "label": "real", "score": 0.07 }]
 */

import type { ClassificationResult, ClassProbabilities, DecodedImage, ModelIdentity } from '../../types/index.js';
import { ClassifierError } from '../../utils/errorHandler.js';
import { DEFAULT_VERDICT_THRESHOLD, deriveVerdict, HttpClassifier } from './ImageClassifier.js';
import type { HttpClassifierOptions } from './ImageClassifier.js';

const FAKE_LABELS = new Set(['fake', 'ai', 'artificial', 'ai-generated', 'ai_generated', 'deepfake', 'synthetic']);
const REAL_LABELS = new Set(['real', 'human', 'authentic', 'realism', 'natural']);

export interface InferenceClassifierOptions extends HttpClassifierOptions {
  model: string;
  modelVersion?: string;
  threshold?: number;
  apiKey?: string;
}

interface LabelScore {
  label: string;
  score: number;
}

function isLabelScore(value: unknown): value is LabelScore {
  return (
    typeof value === 'object' &&
    value !== null &&
    'label' in value &&
    'score' in value &&
    typeof value.label === 'string' &&
    typeof value.score === 'number' &&
    Number.isFinite(value.score)
  );
}

/**
 * Reads label scores from the response body. Accepts a flat array or the batched
 * [[...]] form some servers return for a single input.
 */
export function parseLabelScores(data: unknown): ClassProbabilities {
  const list = Array.isArray(data) && data.length === 1 && Array.isArray(data[0]) ? data[0] : data;
  if (!Array.isArray(list)) {
    throw new ClassifierError('Classifier response is not a list of label scores');
  }

  let fake: number | undefined;
  let real: number | undefined;
  for (const item of list) {
    if (!isLabelScore(item)) continue;
    const label = item.label.trim().toLowerCase();
    if (FAKE_LABELS.has(label)) fake = item.score;
    else if (REAL_LABELS.has(label)) real = item.score;
  }

  if (fake === undefined && real === undefined) {
    throw new ClassifierError('Classifier response has no fake/real scores');
  }

  // Two-class model: a missing score is the complement of the other
  const fakeProbability = fake ?? 1 - (real ?? 0);
  const realProbability = real ?? 1 - fakeProbability;

  return {
    fake: Math.min(1, Math.max(0, fakeProbability)),
    real: Math.min(1, Math.max(0, realProbability))
  };
}

export class InferenceClassifier extends HttpClassifier {
  readonly identity: ModelIdentity;
  private readonly apiKey: string;
  private readonly threshold: number;

  constructor(options: InferenceClassifierOptions) {
    super(options);
    this.threshold = options.threshold ?? DEFAULT_VERDICT_THRESHOLD;
    this.identity = { name: options.model, version: options.modelVersion ?? '1' };
    this.apiKey = options.apiKey ?? '';
  }

  async analyze(image: DecodedImage): Promise<ClassificationResult> {
    const headers: Record<string, string> = { 'Content-Type': 'image/png', Accept: 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const data = await this.postWithBackoff(image.buffer, headers);
    const probabilities = parseLabelScores(data);
    this.logger.debug(`Scores from ${this.identity.name}`, probabilities);

    return deriveVerdict(probabilities, this.identity, this.threshold);
  }
}
