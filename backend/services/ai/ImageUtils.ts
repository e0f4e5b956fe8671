import sharp from 'sharp';
import type { DecodedImage, ImageDecoder } from '../../types/index.js';
import { BadImageError } from '../../utils/errorHandler.js';
import { createLogger } from '../../utils/LoggerUtils.js';

const logger = createLogger('IMAGE UTILS');

const DATA_URL_PREFIX = /^data:image\/[a-z0-9.+-]+;base64,/i;
const BASE64_PATTERN = /^[A-Za-z0-9+/_-]*={0,2}$/;

/**
 * ImageUtils - decoding and normalisation of uploaded images before fingerprinting and classification
 */
export class ImageUtils {

  /**
   * Decodes a base64 payload (optionally a data URL) into raw bytes.
   * Only the encoding is checked here; whether the bytes are an image is decided by prepareImage.
   */
  public static decodeBase64(payload: string): Buffer {
    const base64Data = payload.trim().replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');

    if (!base64Data) {
      throw new BadImageError('Image data is empty');
    }
    if (!BASE64_PATTERN.test(base64Data)) {
      throw new BadImageError('Image data is not valid base64');
    }

    const bytes = Buffer.from(base64Data, 'base64');
    if (bytes.length === 0) {
      throw new BadImageError('Image data is empty');
    }
    return bytes;
  }

  /**
   * Prepares an image buffer for the serving pipeline.
   * Applies EXIF orientation so that the fingerprint matches what a viewer sees, and
   * standardizes to PNG so that classifiers receive one format.
   */
  public static async prepareImage(rawImageBuffer: Buffer): Promise<DecodedImage> {
    if (rawImageBuffer.length === 0) {
      throw new BadImageError('Image data is empty');
    }

    try {
      const metadata = await sharp(rawImageBuffer).metadata();
      const { data, info } = await sharp(rawImageBuffer)
        .rotate()
        .png()
        .toBuffer({ resolveWithObject: true });

      if (!info.width || !info.height) {
        throw new Error('Could not determine dimensions of the image.');
      }

      logger.debug(`Image prepared: ${metadata.format ?? 'unknown'} ${info.width}x${info.height}`);

      return {
        buffer: data,
        width: info.width,
        height: info.height,
        format: metadata.format ?? 'unknown'
      };
    } catch (error) {
      logger.warn('Failed to decode image', error instanceof Error ? error.message : String(error));
      throw new BadImageError('Invalid image data', { cause: error });
    }
  }
}

export class SharpImageDecoder implements ImageDecoder {
  decode(bytes: Buffer): Promise<DecodedImage> {
    return ImageUtils.prepareImage(bytes);
  }
}
