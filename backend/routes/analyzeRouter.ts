/**
 * Analyze Routes
 * POST /api/analyze - classify one image (JSON base64 or multipart upload)
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { ServingOrchestrator } from '../services/ServingOrchestrator.js';
import { ImageUtils } from '../services/ai/ImageUtils.js';
import { createImageUpload } from '../middleware/upload.js';
import { BadImageError } from '../utils/errorHandler.js';

function readString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/**
 * Accepts camelCase fields and the snake_case names older browser clients send.
 */
function readField(body: unknown, ...names: string[]): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined;
  for (const name of names) {
    const value = readString(Reflect.get(body, name));
    if (value !== undefined) return value;
  }
  return undefined;
}

export function createAnalyzeRouter(orchestrator: ServingOrchestrator, maxImageSizeMB: number) {
  const router = express.Router();

  router.post('/', createImageUpload(maxImageSizeMB), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: unknown = req.body;
      const sourceUrl = readField(body, 'sourceUrl', 'source_url');
      const imageUrl = readField(body, 'imageUrl', 'image_url');

      if (!sourceUrl) {
        throw new BadImageError('sourceUrl is required');
      }

      let image: Buffer;
      if (req.file) {
        image = req.file.buffer;
      } else {
        const imageBase64 = readField(body, 'imageBase64', 'image_base64');
        if (!imageBase64) {
          throw new BadImageError('imageBase64 or an "image" file upload is required');
        }
        image = ImageUtils.decodeBase64(imageBase64);
      }

      const clientId = req.ip || req.socket.remoteAddress || 'unknown';
      const outcome = await orchestrator.handle({ image, sourceUrl, imageUrl, clientId });

      if (outcome.status === 'rate_limited') {
        const resetSeconds = Math.ceil(outcome.resetSeconds);
        res.set({
          'X-RateLimit-Limit': String(outcome.limit),
          'X-RateLimit-Remaining': String(outcome.remaining),
          'X-RateLimit-Reset': String(resetSeconds),
          'Retry-After': String(Math.max(1, resetSeconds))
        });
        return res.status(429).json({
          success: false,
          error: 'RATE_LIMITED',
          message: `Rate limit exceeded. Try again in ${resetSeconds} seconds.`,
          remaining: outcome.remaining,
          resetSeconds
        });
      }

      res.set({
        'X-RateLimit-Limit': String(orchestrator.rateLimiter.limit),
        'X-RateLimit-Remaining': String(outcome.response.remaining)
      });
      return res.json({ success: true, ...outcome.response });
    } catch (error) {
      return next(error);
    }
  });

  return router;
}
