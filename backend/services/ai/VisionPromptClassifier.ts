/**
 * Vision Prompt Classifier
 * Asks a multimodal chat model (messages-style API) for a verdict and parses its text reply.
 */

import type { ClassificationResult, Decision, DecodedImage, ModelIdentity } from '../../types/index.js';
import DETECTION_PROMPT from '../../config/prompts/image_detection_prompt.js';
import { ClassifierError } from '../../utils/errorHandler.js';
import { HttpClassifier } from './ImageClassifier.js';
import type { HttpClassifierOptions } from './ImageClassifier.js';

const DEFAULT_CONFIDENCE = 0.5;
const MAX_DETAIL_LENGTH = 500;

const CONFIDENCE_PATTERNS = [
  /CONFIDENCE[:\s]+(\d{1,3}(?:\.\d+)?)\s*%/i,
  /(\d{1,3}(?:\.\d+)?)\s*%\s+confiden/i,
  /\((\d{1,3}(?:\.\d+)?)\s*%\)/
];

export interface VisionPromptClassifierOptions extends HttpClassifierOptions {
  model: string;
  apiKey: string;
  apiVersion?: string;
  maxTokens?: number;
}

export interface ParsedVerdict {
  decision: Exclude<Decision, 'error'>;
  confidence: number;
}

function decisionFrom(text: string): ParsedVerdict['decision'] | null {
  const lower = text.toLowerCase();
  if (lower.includes('ai-generated') || lower.includes('ai generated')) return 'ai';
  if (lower.includes('3d render')) return 'ai';
  if (lower.includes('real photograph')) return 'real';
  if (lower.includes('uncertain')) return 'uncertain';
  return null;
}

/**
 * Extracts verdict and confidence from the model's reply.
 * The VERDICT line wins over mentions elsewhere; a reply with no recognisable verdict is
 * uncertain, never real.
 */
export function parseVerdictText(reply: string): ParsedVerdict {
  const verdictLine = /VERDICT:\s*(.+)/i.exec(reply);
  const decision = (verdictLine ? decisionFrom(verdictLine[1]) : null) ?? decisionFrom(reply) ?? 'uncertain';

  let confidence = DEFAULT_CONFIDENCE;
  for (const pattern of CONFIDENCE_PATTERNS) {
    const match = pattern.exec(reply);
    if (match) {
      confidence = Math.min(100, parseFloat(match[1])) / 100;
      break;
    }
  }

  return { decision, confidence };
}

function extractReplyText(data: unknown): string {
  if (typeof data === 'object' && data !== null && 'content' in data && Array.isArray(data.content)) {
    for (const block of data.content) {
      if (typeof block === 'object' && block !== null && 'text' in block && typeof block.text === 'string') {
        return block.text;
      }
    }
  }
  throw new ClassifierError('Vision model response has no text content');
}

export class VisionPromptClassifier extends HttpClassifier {
  readonly identity: ModelIdentity;
  private readonly apiKey: string;
  private readonly apiVersion: string;
  private readonly maxTokens: number;

  constructor(options: VisionPromptClassifierOptions) {
    super(options);
    this.apiKey = options.apiKey;
    this.apiVersion = options.apiVersion ?? '2023-06-01';
    this.maxTokens = options.maxTokens ?? 1024;
    this.identity = { name: options.model, version: this.apiVersion };
  }

  async analyze(image: DecodedImage): Promise<ClassificationResult> {
    if (!this.apiKey) {
      throw new ClassifierError('Vision classifier API key is not configured');
    }

    const body = {
      model: this.identity.name,
      max_tokens: this.maxTokens,
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'image',
              source: { type: 'base64', media_type: 'image/png', data: image.buffer.toString('base64') }
            },
            { type: 'text', text: DETECTION_PROMPT }
          ]
        }
      ]
    };

    const data = await this.postWithBackoff(body, {
      'Content-Type': 'application/json',
      'x-api-key': this.apiKey,
      'anthropic-version': this.apiVersion
    });

    const reply = extractReplyText(data);
    const { decision, confidence } = parseVerdictText(reply);

    let fake = 0.5;
    let real = 0.5;
    if (decision === 'ai') {
      fake = confidence;
      real = 1 - confidence;
    } else if (decision === 'real') {
      real = confidence;
      fake = 1 - confidence;
    }

    return {
      decision,
      confidence,
      classProbabilities: { fake, real },
      modelIdentity: this.identity,
      detail: reply.slice(0, MAX_DETAIL_LENGTH)
    };
  }
}
