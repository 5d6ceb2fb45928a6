import { promises as fs } from 'fs';
import * as path from 'path';
import sharp from 'sharp';
import { ConfigurationError } from '../../../src/common/errors/pipeline.errors';
import { CatalogueDataLoader } from '../../../src/catalogue/catalogue-data.loader';
import { CataloguePdfService } from '../../../src/catalogue/catalogue-pdf.service';
import { CatalogueService } from '../../../src/catalogue/catalogue.service';
import {
  createTempDir,
  createTestConfig,
  removeDir,
  writeJson,
} from '../helpers/test-context';

describe('CataloguePdfService', () => {
  let outputDir: string;
  let detailDir: string;

  const buildInputs = async (overrides: Record<string, unknown> = {}) => {
    const config = createTestConfig({ OUTPUT_DIR: outputDir, ...overrides });
    const pdf = new CataloguePdfService(config);
    const loader = new CatalogueDataLoader();
    const platforms = await loader.loadDetailTree(detailDir);
    const catalogue = new CatalogueService(loader, pdf, config).buildCatalogue(platforms, 5);
    return { pdf, platforms, catalogue };
  };

  beforeEach(async () => {
    outputDir = await createTempDir('catalogue-pdf');
    detailDir = path.join(outputDir, 'detail');
    const platformDir = path.join(detailDir, 'PlayStation');

    await writeJson(path.join(platformDir, 'platform_info.json'), {
      id: 7,
      name: 'PlayStation',
      abbreviation: 'PS1',
      versions: [
        {
          name: 'Initial',
          summary: 'The first model.',
          platform_logo: { image_id: 'pl1', local_file_path: 'platform_logo_41_pl1.png' },
          platform_version_release_dates: [
            { date: '1995-09-29', release_region: { region: 'europe' } },
          ],
        },
      ],
    });
    await sharp({
      create: { width: 40, height: 10, channels: 4, background: { r: 0, g: 0, b: 200, alpha: 1 } },
    })
      .png()
      .toFile(path.join(platformDir, 'platform_logo_41_pl1.png'));

    const gameDir = path.join(platformDir, 'Crash_Bandicoot');
    await writeJson(path.join(gameDir, 'Crash_Bandicoot.json'), {
      id: 1,
      name: 'Crash Bandicoot',
      first_release_date: '1996-09-09',
      rating: 80,
      cover: { image_id: 'co1', local_file_path: 'cover_11_co1.webp' },
    });
    await sharp({
      create: { width: 30, height: 40, channels: 3, background: { r: 255, g: 0, b: 0 } },
    })
      .webp({ lossless: true })
      .toFile(path.join(gameDir, 'cover_11_co1.webp'));

    const brokenCoverDir = path.join(platformDir, 'Spyro');
    await writeJson(path.join(brokenCoverDir, 'Spyro.json'), { id: 2, name: 'Spyro', rating: 70 });
    await fs.writeFile(path.join(brokenCoverDir, 'cover_12_co2.webp'), 'not an image');
  });

  afterEach(async () => {
    await removeDir(outputDir);
  });

  it('writes one document per platform with the covers decoded', async () => {
    const { pdf, platforms, catalogue } = await buildInputs();
    const folder = path.join(outputDir, 'catalogue');

    const files = await pdf.generateAll(catalogue, platforms, detailDir, folder);

    expect(files).toEqual([path.join(folder, 'PlayStation_Catalogue.pdf')]);
    const content = (await fs.readFile(files[0])).toString('latin1');
    expect(content.startsWith('%PDF-')).toBe(true);
    expect(content).toContain('/Title (PlayStation Catalogue)');
    expect(content).toContain('/Subtype /Image');
  });

  it('fails when the configured font file is missing', async () => {
    const { pdf, platforms, catalogue } = await buildInputs({
      CATALOGUE_FONT_FILE: path.join(outputDir, 'missing.ttf'),
    });

    await expect(
      pdf.generateAll(catalogue, platforms, detailDir, path.join(outputDir, 'catalogue')),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});
