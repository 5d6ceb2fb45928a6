import {
  addLocalFilePaths,
  findImageObjects,
  resolveImageType,
} from './image-downloader.service';

const image = (imageId: string, id: number) => ({ id, image_id: imageId, width: 10, height: 10 });

describe('image helpers', () => {
  it('maps plural and alias fields to image types', () => {
    expect(resolveImageType('covers')).toBe('cover');
    expect(resolveImageType('logo')).toBe('company_logo');
    expect(resolveImageType('platform_logo')).toBe('platform_logo');
    expect(resolveImageType('banner')).toBe('banner');
  });

  it('finds nested image objects once per image id', () => {
    const record = {
      id: 1,
      cover: image('co1', 11),
      screenshots: [image('sc1', 21), image('sc2', 22)],
      involved_companies: [{ company: { logo: image('cl1', 31) } }],
      artworks: [image('sc1', 21)],
      versions: [{ platform_logo: { image_id: 'incomplete' } }],
    };

    expect(findImageObjects(record).map((t) => [t.type, t.image.image_id])).toEqual([
      ['cover', 'co1'],
      ['screenshot', 'sc1'],
      ['screenshot', 'sc2'],
      ['company_logo', 'cl1'],
    ]);
  });

  it('adds local file paths without touching the input', () => {
    const record = { id: 1, cover: image('co1', 11), screenshots: [image('sc1', 21)] };

    const withPaths = addLocalFilePaths(record, { co1: 'cover_11_co1.webp' });

    expect(withPaths).toEqual({
      id: 1,
      cover: { ...image('co1', 11), local_file_path: 'cover_11_co1.webp' },
      screenshots: [image('sc1', 21)],
    });
    expect(record.cover).not.toHaveProperty('local_file_path');
  });
});
