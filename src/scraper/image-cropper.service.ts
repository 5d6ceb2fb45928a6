import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import sharp from 'sharp';
import { EntityProcessingError, errorMessage } from '../common/errors/pipeline.errors';

export interface BoundingBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * Bounding box of every pixel whose alpha is above zero, or null when the
 * image is fully transparent. `data` is raw interleaved pixel data with the
 * alpha in the last channel.
 */
export function findOpaqueBounds(
  data: Uint8Array,
  width: number,
  height: number,
  channels: number,
): BoundingBox | null {
  let top = height;
  let left = width;
  let bottom = -1;
  let right = -1;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const alpha = data[(y * width + x) * channels + channels - 1];
      if (alpha === 0) continue;
      if (y < top) top = y;
      if (y > bottom) bottom = y;
      if (x < left) left = x;
      if (x > right) right = x;
    }
  }

  if (bottom < 0) return null;
  return { left, top, width: right - left + 1, height: bottom - top + 1 };
}

@Injectable()
export class ImageCropperService {
  private readonly logger = new Logger(ImageCropperService.name);

  /**
   * Trims transparent borders in place. Returns false when nothing was
   * trimmed.
   */
  async cropTransparentBorders(filePath: string): Promise<boolean> {
    try {
      const input = await fs.readFile(filePath);
      const metadata = await sharp(input).metadata();
      if (!metadata.hasAlpha) return false;

      const { data, info } = await sharp(input)
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });
      const box = findOpaqueBounds(data, info.width, info.height, info.channels);
      if (!box) return false;
      if (box.width === info.width && box.height === info.height) return false;

      let pipeline = sharp(input).extract(box);
      if (metadata.format === 'webp') {
        pipeline = pipeline.webp({ lossless: true });
      } else if (metadata.format === 'png') {
        pipeline = pipeline.png();
      }
      await fs.writeFile(filePath, await pipeline.toBuffer());

      this.logger.debug(
        `Cropped ${filePath} from ${info.width}x${info.height} to ${box.width}x${box.height}`,
      );
      return true;
    } catch (error) {
      throw new EntityProcessingError(
        `Failed to crop image ${filePath}: ${errorMessage(error)}`,
        filePath,
        error,
      );
    }
  }
}
