import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import sharp from 'sharp';
import { ImageCropperService, findOpaqueBounds } from './image-cropper.service';

// RGBA pixels, transparent except for the given coordinates
const pixels = (opaque: Array<[number, number]>, width = 4, height = 3): Uint8Array => {
  const data = new Uint8Array(width * height * 4);
  for (const [x, y] of opaque) data[(y * width + x) * 4 + 3] = 255;
  return data;
};

describe('findOpaqueBounds', () => {
  it('returns the box around non-transparent pixels', () => {
    expect(findOpaqueBounds(pixels([[1, 1], [2, 1]]), 4, 3, 4)).toEqual({
      left: 1,
      top: 1,
      width: 2,
      height: 1,
    });
  });

  it('returns null for a fully transparent image', () => {
    expect(findOpaqueBounds(pixels([]), 4, 3, 4)).toBeNull();
  });
});

describe('ImageCropperService', () => {
  const cropper = new ImageCropperService();
  let folder: string;

  beforeEach(async () => {
    folder = await fs.mkdtemp(path.join(os.tmpdir(), 'cropper-'));
  });

  afterEach(async () => {
    await fs.rm(folder, { recursive: true, force: true });
  });

  it('trims transparent borders in place', async () => {
    const dot = await sharp({
      create: { width: 2, height: 3, channels: 4, background: { r: 255, g: 0, b: 0, alpha: 1 } },
    })
      .png()
      .toBuffer();
    const filePath = path.join(folder, 'platform_logo_1_x.png');
    await sharp({
      create: { width: 10, height: 10, channels: 4, background: { r: 0, g: 0, b: 0, alpha: 0 } },
    })
      .composite([{ input: dot, left: 4, top: 3 }])
      .png()
      .toFile(filePath);

    await expect(cropper.cropTransparentBorders(filePath)).resolves.toBe(true);

    const metadata = await sharp(filePath).metadata();
    expect([metadata.width, metadata.height]).toEqual([2, 3]);
  });

  it('leaves images without alpha untouched', async () => {
    const filePath = path.join(folder, 'opaque.png');
    await sharp({
      create: { width: 5, height: 5, channels: 3, background: { r: 10, g: 20, b: 30 } },
    })
      .png()
      .toFile(filePath);

    await expect(cropper.cropTransparentBorders(filePath)).resolves.toBe(false);
  });
});
