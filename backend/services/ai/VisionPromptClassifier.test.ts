/**
 * Tests for the prompt-based vision classifier
 */

import { parseVerdictText, VisionPromptClassifier } from './VisionPromptClassifier';
import type { HttpPost, HttpResponse } from './ImageClassifier';
import type { DecodedImage } from '../../types';
import { ClassifierError } from '../../utils/errorHandler';

const image: DecodedImage = { buffer: Buffer.from('png-bytes'), width: 2, height: 2, format: 'png' };

describe('VisionPromptClassifier', () => {
  describe('parseVerdictText', () => {
    it('should read the verdict and confidence lines', () => {
      expect(parseVerdictText('VERDICT: AI-Generated\nCONFIDENCE: 85%\nREASONING: smooth skin')).toEqual({
        decision: 'ai',
        confidence: 0.85
      });
    });

    it('should prefer the verdict line over mentions in the reasoning', () => {
      const reply = 'VERDICT: Real Photograph\nCONFIDENCE: 70%\nREASONING: no signs it is AI-generated';

      expect(parseVerdictText(reply)).toEqual({ decision: 'real', confidence: 0.7 });
    });

    it('should treat 3D renders as AI', () => {
      expect(parseVerdictText('VERDICT: 3D Render (90%)').decision).toBe('ai');
    });

    it('should fall back to uncertain with default confidence', () => {
      expect(parseVerdictText('I cannot tell.')).toEqual({ decision: 'uncertain', confidence: 0.5 });
    });

    it('should read confidence written after the number', () => {
      expect(parseVerdictText('This looks AI generated, 60% confident.').confidence).toBe(0.6);
    });
  });

  describe('analyze', () => {
    let post: jest.Mock<Promise<HttpResponse>, Parameters<HttpPost>>;

    const createClassifier = (apiKey = 'test-key') =>
      new VisionPromptClassifier({
        endpoint: 'http://127.0.0.1:9000/v1/messages',
        timeoutMs: 5000,
        model: 'vision-model',
        apiKey,
        post,
        sleep: async () => undefined
      });

    beforeEach(() => {
      post = jest.fn<Promise<HttpResponse>, Parameters<HttpPost>>();
    });

    it('should turn the reply into probabilities', async () => {
      const reply = 'VERDICT: Real Photograph\nCONFIDENCE: 90%\nREASONING: natural sensor noise';
      post.mockResolvedValueOnce({ status: 200, data: { content: [{ type: 'text', text: reply }] } });

      const result = await createClassifier().analyze(image);

      expect(result.decision).toBe('real');
      expect(result.confidence).toBe(0.9);
      expect(result.classProbabilities.real).toBe(0.9);
      expect(result.classProbabilities.fake).toBeCloseTo(0.1);
      expect(result.modelIdentity).toEqual({ name: 'vision-model', version: '2023-06-01' });
      expect(result.detail).toBe(reply);
    });

    it('should send the image and credentials', async () => {
      post.mockResolvedValueOnce({ status: 200, data: { content: [{ type: 'text', text: 'VERDICT: Uncertain' }] } });

      await createClassifier().analyze(image);

      const [url, body, config] = post.mock.calls[0];
      expect(url).toBe('http://127.0.0.1:9000/v1/messages');
      expect(body).toMatchObject({
        model: 'vision-model',
        messages: [
          {
            role: 'user',
            content: [{ type: 'image', source: { type: 'base64', media_type: 'image/png', data: image.buffer.toString('base64') } }, { type: 'text' }]
          }
        ]
      });
      expect(config.headers).toMatchObject({ 'x-api-key': 'test-key', 'anthropic-version': '2023-06-01' });
    });

    it('should refuse to run without an API key', async () => {
      await expect(createClassifier('').analyze(image)).rejects.toBeInstanceOf(ClassifierError);
      expect(post).not.toHaveBeenCalled();
    });

    it('should reject a response without text', async () => {
      post.mockResolvedValueOnce({ status: 200, data: { content: [] } });

      await expect(createClassifier().analyze(image)).rejects.toThrow('Vision model response has no text content');
    });
  });
});
