import { promises as fs } from 'fs';
import * as path from 'path';
import { IgdbApiService } from '../../../src/igdb/igdb-api.service';
import { IgdbRecord, isJsonObject } from '../../../src/igdb/igdb.types';
import { TokenManagerService } from '../../../src/igdb/token-manager.service';
import { EndpointConfigService } from '../../../src/reference-data/endpoint-config.service';
import { IgdbScraperService } from '../../../src/scraper/igdb-scraper.service';
import { ImageCropperService } from '../../../src/scraper/image-cropper.service';
import {
  DownloadedFiles,
  ImageDownloaderService,
} from '../../../src/scraper/image-downloader.service';
import {
  createHttpService,
  createTempDir,
  createTestConfig,
  readJson,
  removeDir,
  writeJson,
} from '../helpers/test-context';

const PLATFORMS_URL = 'https://api.igdb.com/v4/platforms';
const GAMES_URL = 'https://api.igdb.com/v4/games';

const GAME_PAGES: Record<number, IgdbRecord[]> = {
  0: [
    {
      id: 1,
      name: 'Super Mario 64',
      first_release_date: 946684800,
      cover: { id: 11, image_id: 'co1', width: 1, height: 1 },
    },
    { id: 2, name: 'Crash: Bandicoot' },
  ],
  2: [{ id: 1, name: 'Super Mario 64' }],
};

describe('IgdbScraperService', () => {
  let dir: string;

  const createScraper = async () => {
    const platformsFile = path.join(dir, 'platforms.csv');
    await fs.writeFile(platformsFile, 'id,name\n7,PlayStation\n99,Missing\n', 'utf-8');
    const platformEndpointFile = path.join(dir, 'platform_endpoint.json');
    await writeJson(platformEndpointFile, {
      name: 'platform',
      properties: { endpoint_url: PLATFORMS_URL, body: 'fields name,versions.*;' },
    });
    const gameEndpointFile = path.join(dir, 'game_endpoint.json');
    await writeJson(gameEndpointFile, {
      name: 'games',
      properties: {
        endpoint_url: GAMES_URL,
        body: 'fields name,cover.*; where version_parent = null; sort rating desc;',
      },
    });

    const config = createTestConfig({
      OUTPUT_DIR: dir,
      PLATFORMS_FILE: platformsFile,
      PLATFORM_ENDPOINT_FILE: platformEndpointFile,
      GAME_ENDPOINT_FILE: gameEndpointFile,
      GAMES_PER_PLATFORM: 3,
      IGDB_BATCH_LIMIT: 2,
    });
    const http = createHttpService();
    const api = new IgdbApiService(http, new TokenManagerService(http, config));
    const downloader = new ImageDownloaderService(http, new ImageCropperService(), config);
    const scraper = new IgdbScraperService(api, new EndpointConfigService(), downloader, config);

    const query = jest.spyOn(api, 'query').mockImplementation(async (url, body) => {
      if (url === PLATFORMS_URL) {
        return body.includes('where id = (7);')
          ? [
              {
                id: 7,
                name: 'PlayStation',
                versions: [{ name: 'Initial', platform_version_release_dates: [{ date: 946684800 }] }],
              },
            ]
          : [];
      }
      const offset = Number(/offset (\d+);/.exec(body)?.[1]);
      return GAME_PAGES[offset] ?? [];
    });
    const download = jest
      .spyOn(downloader, 'downloadRecordImages')
      .mockImplementation(async (record): Promise<DownloadedFiles> =>
        isJsonObject(record) && record.id === 1 ? { co1: 'cover_11_co1.webp' } : {},
      );

    return { scraper, query, download };
  };

  beforeEach(async () => {
    dir = await createTempDir('scraper');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('writes the detail tree for every platform found', async () => {
    const { scraper, query, download } = await createScraper();

    const summary = await scraper.run();

    expect(summary).toEqual({
      platformsRequested: 2,
      platforms: [
        {
          platformId: '7',
          platformName: 'PlayStation',
          folder: 'PlayStation',
          gamesWritten: 2,
          duplicatesRemoved: 1,
        },
      ],
      skipped: [{ id: '99', name: 'Missing' }],
    });
    expect(query.mock.calls.map(([, body]) => body)).toEqual([
      'fields name,versions.*; where id = (7); limit 1; offset 0;',
      'fields name,cover.*; where platforms = (7) & version_parent = null; sort rating desc; limit 2; offset 0;',
      'fields name,cover.*; where platforms = (7) & version_parent = null; sort rating desc; limit 1; offset 2;',
      'fields name,versions.*; where id = (99); limit 1; offset 0;',
    ]);
    expect(download).toHaveBeenCalledTimes(3);

    const platformDir = path.join(dir, 'detail', 'PlayStation');
    await expect(readJson(path.join(platformDir, 'platform_info.json'))).resolves.toEqual({
      id: 7,
      name: 'PlayStation',
      versions: [{ name: 'Initial', platform_version_release_dates: [{ date: '2000-01-01' }] }],
    });
    await expect(
      readJson(path.join(platformDir, 'Super_Mario_64', 'Super_Mario_64.json')),
    ).resolves.toEqual({
      id: 1,
      name: 'Super Mario 64',
      first_release_date: '2000-01-01',
      cover: {
        id: 11,
        image_id: 'co1',
        width: 1,
        height: 1,
        local_file_path: 'cover_11_co1.webp',
      },
    });
    await expect(
      readJson(path.join(platformDir, 'Crash_Bandicoot', 'Crash_Bandicoot.json')),
    ).resolves.toEqual({ id: 2, name: 'Crash: Bandicoot' });
  });
});
