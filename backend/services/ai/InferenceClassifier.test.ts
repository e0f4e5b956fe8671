/**
 * Tests for the label-score inference classifier
 */

import { InferenceClassifier, parseLabelScores } from './InferenceClassifier';
import { deriveVerdict, errorResult } from './ImageClassifier';
import type { HttpPost, HttpResponse } from './ImageClassifier';
import type { DecodedImage } from '../../types';
import { ClassifierError } from '../../utils/errorHandler';

const image: DecodedImage = { buffer: Buffer.from('png-bytes'), width: 2, height: 2, format: 'png' };

const scores = [
  { label: 'Fake', score: 0.9 },
  { label: 'Real', score: 0.1 }
];

describe('InferenceClassifier', () => {
  let post: jest.Mock<Promise<HttpResponse>, Parameters<HttpPost>>;
  let sleep: jest.Mock<Promise<void>, [number]>;

  const createClassifier = (maxRetries = 3) =>
    new InferenceClassifier({
      endpoint: 'http://127.0.0.1:8080/classify',
      timeoutMs: 5000,
      model: 'detector-v1',
      apiKey: 'test-key',
      maxRetries,
      post,
      sleep
    });

  beforeEach(() => {
    post = jest.fn<Promise<HttpResponse>, Parameters<HttpPost>>();
    sleep = jest.fn<Promise<void>, [number]>(async () => undefined);
  });

  describe('parseLabelScores', () => {
    it('should read fake and real scores case-insensitively', () => {
      expect(parseLabelScores(scores)).toEqual({ fake: 0.9, real: 0.1 });
    });

    it('should accept the batched form', () => {
      expect(parseLabelScores([[{ label: 'artificial', score: 0.3 }, { label: 'human', score: 0.7 }]])).toEqual({
        fake: 0.3,
        real: 0.7
      });
    });

    it('should fill in a missing score as the complement', () => {
      const probabilities = parseLabelScores([{ label: 'real', score: 0.25 }]);

      expect(probabilities).toEqual({ fake: 0.75, real: 0.25 });
    });

    it('should reject bodies without usable scores', () => {
      expect(() => parseLabelScores({ label: 'fake' })).toThrow(ClassifierError);
      expect(() => parseLabelScores([{ label: 'cat', score: 0.99 }])).toThrow('Classifier response has no fake/real scores');
    });
  });

  describe('deriveVerdict', () => {
    const model = { name: 'm', version: '1' };

    it('should pick the class that clears the threshold', () => {
      expect(deriveVerdict({ fake: 0.9, real: 0.1 }, model)).toMatchObject({ decision: 'ai', confidence: 0.9 });
      expect(deriveVerdict({ fake: 0.2, real: 0.8 }, model)).toMatchObject({ decision: 'real', confidence: 0.8 });
    });

    it('should be uncertain when neither class clears the threshold', () => {
      expect(deriveVerdict({ fake: 0.55, real: 0.45 }, model)).toMatchObject({ decision: 'uncertain', confidence: 0.55 });
      expect(deriveVerdict({ fake: 0.6, real: 0.4 }, model).decision).toBe('uncertain');
    });

    it('should honour a custom threshold', () => {
      expect(deriveVerdict({ fake: 0.7, real: 0.3 }, model, 0.8).decision).toBe('uncertain');
    });
  });

  describe('errorResult', () => {
    it('should carry the failure message and no probabilities', () => {
      expect(errorResult({ name: 'detector-v1', version: '1' }, new Error('boom'))).toEqual({
        decision: 'error',
        confidence: 0,
        classProbabilities: { fake: 0, real: 0 },
        modelIdentity: { name: 'detector-v1', version: '1' },
        detail: 'boom'
      });
    });
  });

  describe('analyze', () => {
    it('should post the image and return a verdict', async () => {
      post.mockResolvedValueOnce({ status: 200, data: scores });

      const result = await createClassifier().analyze(image);

      expect(result).toEqual({
        decision: 'ai',
        confidence: 0.9,
        classProbabilities: { fake: 0.9, real: 0.1 },
        modelIdentity: { name: 'detector-v1', version: '1' }
      });
      expect(post).toHaveBeenCalledWith('http://127.0.0.1:8080/classify', image.buffer, {
        headers: { 'Content-Type': 'image/png', Accept: 'application/json', Authorization: 'Bearer test-key' },
        timeout: 5000,
        validateStatus: expect.any(Function)
      });
    });

    it('should retry server errors with backoff', async () => {
      post.mockResolvedValueOnce({ status: 503, data: null }).mockResolvedValueOnce({ status: 200, data: scores });

      const result = await createClassifier().analyze(image);

      expect(result.decision).toBe('ai');
      expect(post).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledTimes(1);
    });

    it('should retry network failures', async () => {
      post.mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce({ status: 200, data: scores });

      await expect(createClassifier().analyze(image)).resolves.toMatchObject({ decision: 'ai' });
      expect(post).toHaveBeenCalledTimes(2);
    });

    it('should give up after the configured number of retries', async () => {
      post.mockResolvedValue({ status: 503, data: null });

      await expect(createClassifier(2).analyze(image)).rejects.toThrow('Classifier responded with HTTP 503');
      expect(post).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(2);
    });

    it('should not retry client errors', async () => {
      post.mockResolvedValue({ status: 400, data: { error: 'bad input' } });

      await expect(createClassifier().analyze(image)).rejects.toBeInstanceOf(ClassifierError);
      expect(post).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should not retry unrecognised request errors', async () => {
      post.mockRejectedValue(new Error('invalid URL'));

      await expect(createClassifier().analyze(image)).rejects.toThrow('Classifier request failed: invalid URL');
      expect(post).toHaveBeenCalledTimes(1);
    });
  });
});
