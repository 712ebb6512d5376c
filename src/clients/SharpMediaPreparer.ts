import sharp from 'sharp';
import { PublishError } from '../utils/errors';
import { createLogger } from '../utils/logger';

export interface PreparedMedia {
  data: Buffer;
  mimeType: string;
  width: number;
  height: number;
}

/**
 * Turns a photo on disk into an upload the social protocol accepts
 */
export interface MediaPreparer {
  prepare(filePath: string): Promise<PreparedMedia>;
}

export interface SharpMediaPreparerOptions {
  /** Longest edge in pixels after resizing (default: 1200) */
  maxDimension?: number;
  /** Starting JPEG quality (default: 80) */
  quality?: number;
  /** Upload size limit in bytes (Bluesky: 1,000,000) */
  maxBytes?: number;
}

const QUALITY_STEP = 15;
const MIN_QUALITY = 40;

/**
 * Re-encodes photos as JPEG with sharp: applies the EXIF orientation, fits the image inside
 * maxDimension, and lowers quality until the result fits the upload limit.
 * Re-encoding also strips the embedded metadata, GPS included, from what gets uploaded.
 */
export class SharpMediaPreparer implements MediaPreparer {
  private readonly logger = createLogger({ component: 'SharpMediaPreparer' });
  private readonly maxDimension: number;
  private readonly quality: number;
  private readonly maxBytes: number;

  constructor(options: SharpMediaPreparerOptions = {}) {
    this.maxDimension = options.maxDimension ?? 1200;
    this.quality = options.quality ?? 80;
    this.maxBytes = options.maxBytes ?? 1_000_000;
  }

  async prepare(filePath: string): Promise<PreparedMedia> {
    for (let quality = this.quality; ; quality = Math.max(quality - QUALITY_STEP, MIN_QUALITY)) {
      const { data, info } = await this.encode(filePath, quality);

      if (data.length <= this.maxBytes) {
        this.logger.debug({ filePath, quality, bytes: data.length }, 'Media prepared');
        return { data, mimeType: 'image/jpeg', width: info.width, height: info.height };
      }
      if (quality <= MIN_QUALITY) {
        throw new PublishError(
          'validation',
          `${filePath} is ${data.length} bytes at quality ${quality}, over the ${this.maxBytes} byte limit`
        );
      }
      this.logger.debug({ filePath, quality, bytes: data.length }, 'Media too large, lowering quality');
    }
  }

  private async encode(filePath: string, quality: number): Promise<{ data: Buffer; info: sharp.OutputInfo }> {
    try {
      return await sharp(filePath)
        .rotate()
        .resize(this.maxDimension, this.maxDimension, { fit: 'inside', withoutEnlargement: true })
        .jpeg({ quality })
        .toBuffer({ resolveWithObject: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new PublishError('validation', `Cannot encode ${filePath}: ${message}`, { cause: error });
    }
  }
}
