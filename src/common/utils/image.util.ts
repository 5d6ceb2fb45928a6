import { promises as fs } from 'fs';
import * as path from 'path';
import sharp from 'sharp';
import { pathExists } from './json-file.util';

const IMAGE_EXTENSIONS = new Set(['.png', '.webp', '.jpg', '.jpeg', '.gif']);

export interface PngImage {
  data: Buffer;
  width: number;
  height: number;
}

/**
 * Decodes an image file of any format sharp reads (WebP covers included)
 * into PNG bytes with its pixel size.
 */
export async function loadAsPng(imagePath: string): Promise<PngImage> {
  const { data, info } = await sharp(imagePath).png().toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height };
}

export function toPngDataUrl(image: PngImage): string {
  return `data:image/png;base64,${image.data.toString('base64')}`;
}

/** Rasterizes an SVG document at `dpi`. */
export async function rasterizeSvg(svg: string, dpi: number): Promise<PngImage> {
  const { data, info } = await sharp(Buffer.from(svg), { density: dpi })
    .png()
    .toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height };
}

/**
 * `localPath` inside `folder` when that file exists, else the first image
 * file (by name) whose name starts with `prefix`, else null.
 */
export async function findImageFile(
  folder: string,
  localPath: string | null | undefined,
  prefix: string,
): Promise<string | null> {
  if (localPath) {
    const filePath = path.join(folder, localPath);
    if (await pathExists(filePath)) return filePath;
  }

  if (!(await pathExists(folder))) return null;
  const entries = await fs.readdir(folder, { withFileTypes: true });
  const match = entries
    .filter(
      (entry) =>
        entry.isFile() &&
        entry.name.startsWith(prefix) &&
        IMAGE_EXTENSIONS.has(path.extname(entry.name).toLowerCase()),
    )
    .map((entry) => entry.name)
    .sort()[0];
  return match ? path.join(folder, match) : null;
}
