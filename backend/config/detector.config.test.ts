/**
 * Tests for environment-based configuration
 */

import { DEFAULT_DETECTOR_CONFIG, loadDetectorConfig } from './detector.config';
import { buildClassifier } from './classifierPipeline';
import { InferenceClassifier } from '../services/ai/InferenceClassifier';
import { VisionPromptClassifier } from '../services/ai/VisionPromptClassifier';
import { ConfigError } from '../utils/errorHandler';

describe('detector.config', () => {
  describe('loadDetectorConfig', () => {
    it('should fall back to defaults for an empty environment', () => {
      expect(loadDetectorConfig({})).toEqual(DEFAULT_DETECTOR_CONFIG);
    });

    it('should read every setting from the environment', () => {
      const config = loadDetectorConfig({
        HOST: '0.0.0.0',
        PORT: '9000',
        CORS_ORIGINS: 'https://a.example, https://b.example',
        MAX_IMAGE_SIZE_MB: '5',
        RATE_LIMIT_REQUESTS: '10',
        RATE_LIMIT_WINDOW_SECONDS: '30',
        CACHE_MAX_SIZE: '0',
        CACHE_TTL_SECONDS: '0',
        LOG_DIR: '/var/log/detector',
        LOG_RETENTION_DAYS: '7',
        LOG_PRUNE_INTERVAL_HOURS: '6',
        CLASSIFIER_PROVIDER: 'vision-prompt',
        CLASSIFIER_ENDPOINT: 'https://vision.example/v1/messages',
        CLASSIFIER_API_KEY: 'test-secret',
        CLASSIFIER_MODEL: 'vision-model',
        CLASSIFIER_TIMEOUT_MS: '10000',
        CLASSIFIER_THRESHOLD: '0.75'
      });

      expect(config).toEqual({
        host: '0.0.0.0',
        port: 9000,
        corsOrigins: ['https://a.example', 'https://b.example'],
        maxImageSizeMB: 5,
        rateLimitCapacity: 10,
        rateLimitWindowSeconds: 30,
        cacheMaxSize: 0,
        cacheTtlSeconds: 0,
        logDirectory: '/var/log/detector',
        logRetentionDays: 7,
        logPruneIntervalHours: 6,
        classifier: {
          provider: 'vision-prompt',
          endpoint: 'https://vision.example/v1/messages',
          apiKey: 'test-secret',
          model: 'vision-model',
          timeoutMs: 10000,
          threshold: 0.75
        }
      });
    });

    it('should treat blank values as unset', () => {
      expect(loadDetectorConfig({ PORT: '  ', LOG_DIR: '' }).port).toBe(8000);
    });

    it('should report every invalid value at once', () => {
      let caught: unknown;
      try {
        loadDetectorConfig({
          RATE_LIMIT_WINDOW_SECONDS: '0',
          CACHE_MAX_SIZE: 'abc',
          CLASSIFIER_PROVIDER: 'magic',
          PORT: '70000'
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      if (!(caught instanceof ConfigError)) return;
      expect(caught.problems).toEqual([
        'PORT must be at most 65535 (got "70000")',
        'RATE_LIMIT_WINDOW_SECONDS must be greater than 0 (got "0")',
        'CACHE_MAX_SIZE must be a number (got "abc")',
        'CLASSIFIER_PROVIDER must be "inference" or "vision-prompt" (got "magic")'
      ]);
    });

    it('should reject thresholds that would let both classes win', () => {
      expect(() => loadDetectorConfig({ CLASSIFIER_THRESHOLD: '0.4' })).toThrow(
        'Invalid configuration: CLASSIFIER_THRESHOLD must be at least 0.5 (got "0.4")'
      );
    });

    it('should reject timer values Node cannot schedule', () => {
      let caught: unknown;
      try {
        loadDetectorConfig({ LOG_PRUNE_INTERVAL_HOURS: '1000', CLASSIFIER_TIMEOUT_MS: '5000000000' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      if (!(caught instanceof ConfigError)) return;
      expect(caught.problems).toEqual([
        'LOG_PRUNE_INTERVAL_HOURS must be at most 596 (got "1000")',
        'CLASSIFIER_TIMEOUT_MS must be at most 2147483647 (got "5000000000")'
      ]);
    });

    it('should accept the largest schedulable prune interval', () => {
      expect(loadDetectorConfig({ LOG_PRUNE_INTERVAL_HOURS: '596' }).logPruneIntervalHours).toBe(596);
    });

    it('should reject fractional request limits', () => {
      expect(() => loadDetectorConfig({ RATE_LIMIT_REQUESTS: '2.5' })).toThrow('RATE_LIMIT_REQUESTS must be an integer');
    });
  });

  describe('buildClassifier', () => {
    it('should build the configured provider', () => {
      const classifier = DEFAULT_DETECTOR_CONFIG.classifier;

      expect(buildClassifier(classifier)).toBeInstanceOf(InferenceClassifier);
      expect(buildClassifier({ ...classifier, provider: 'vision-prompt', apiKey: 'test-secret' })).toBeInstanceOf(VisionPromptClassifier);
      expect(buildClassifier(classifier).identity).toEqual({ name: 'deepfake-detector-model-v1', version: '1' });
    });
  });
});
