import type { ImageClassifier } from '../types/index.js';
import type { ClassifierConfig } from './detector.config.js';
import { InferenceClassifier } from '../services/ai/InferenceClassifier.js';
import { VisionPromptClassifier } from '../services/ai/VisionPromptClassifier.js';

export function buildClassifier(config: ClassifierConfig): ImageClassifier {
  switch (config.provider) {
    case 'vision-prompt':
      return new VisionPromptClassifier({
        endpoint: config.endpoint,
        timeoutMs: config.timeoutMs,
        model: config.model,
        apiKey: config.apiKey
      });
    case 'inference':
      return new InferenceClassifier({
        endpoint: config.endpoint,
        timeoutMs: config.timeoutMs,
        threshold: config.threshold,
        model: config.model,
        apiKey: config.apiKey
      });
  }
}
