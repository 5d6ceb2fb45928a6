import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import { EnvironmentVariables } from '../config/environment';
import { collectPaginated } from '../common/collector/paginated-collector';
import { dedupeById } from '../common/collector/dedupe.util';
import { LoggerHelper } from '../common/utils/logger.helper';
import { toFolderName } from '../common/utils/filename.util';
import { writeJsonFile } from '../common/utils/json-file.util';
import { IgdbApiService } from '../igdb/igdb-api.service';
import { IgdbRecord } from '../igdb/igdb.types';
import {
  withIdFilter,
  withPage,
  withPlatformFilter,
} from '../igdb/utils/apicalypse-query.util';
import {
  EndpointConfigService,
  ResolvedEndpoint,
} from '../reference-data/endpoint-config.service';
import {
  ImageDownloaderService,
  addLocalFilePaths,
} from './image-downloader.service';
import {
  DETAIL_DIR,
  PLATFORM_INFO_FILE,
  UNKNOWN_GAME_FOLDER,
  UNKNOWN_PLATFORM_FOLDER,
} from './scraper.constants';
import { PlatformEntry, readPlatformsCsv } from './utils/platform-csv.reader';
import { normalizeRecord } from './utils/record-normalizer.util';

export interface PlatformScrapeResult {
  platformId: string;
  platformName: string;
  folder: string;
  gamesWritten: number;
  duplicatesRemoved: number;
}

export interface ScrapeSummary {
  platformsRequested: number;
  platforms: PlatformScrapeResult[];
  skipped: PlatformEntry[];
}

/**
 * Builds the detail tree consumed by the catalogue stage:
 *
 * ```
 * detail/<Platform_Folder>/platform_info.json
 * detail/<Platform_Folder>/<Game_Folder>/<Game_Folder>.json
 * ```
 *
 * with the downloaded images beside each JSON file.
 */
@Injectable()
export class IgdbScraperService {
  private readonly logger = new Logger(IgdbScraperService.name);

  constructor(
    private readonly igdbApi: IgdbApiService,
    private readonly endpointConfig: EndpointConfigService,
    private readonly imageDownloader: ImageDownloaderService,
    private readonly config: ConfigService<EnvironmentVariables, true>,
  ) {}

  get detailDir(): string {
    return path.join(this.config.get('OUTPUT_DIR', { infer: true }), DETAIL_DIR);
  }

  async run(): Promise<ScrapeSummary> {
    const platformsFile = this.config.get('PLATFORMS_FILE', { infer: true });
    const gamesCount = this.config.get('GAMES_PER_PLATFORM', { infer: true });

    const entries = await readPlatformsCsv(platformsFile);
    const platformEndpoint = await this.endpointConfig.loadSingleEndpoint(
      this.config.get('PLATFORM_ENDPOINT_FILE', { infer: true }),
    );
    const gameEndpoint = await this.endpointConfig.loadSingleEndpoint(
      this.config.get('GAME_ENDPOINT_FILE', { infer: true }),
    );

    LoggerHelper.logStart(this.logger, 'Scrape', {
      platforms: entries.length,
      gamesPerPlatform: gamesCount,
    });

    const summary: ScrapeSummary = {
      platformsRequested: entries.length,
      platforms: [],
      skipped: [],
    };

    for (const entry of entries) {
      this.logger.log(`Processing platform: ${entry.name} (ID: ${entry.id})`);
      const result = await this.scrapePlatform(
        entry,
        platformEndpoint,
        gameEndpoint,
        gamesCount,
      );
      if (result) {
        summary.platforms.push(result);
      } else {
        summary.skipped.push(entry);
      }
    }

    LoggerHelper.logComplete(this.logger, 'Scrape', {
      platforms: summary.platforms.length,
      skipped: summary.skipped.length,
      games: summary.platforms.reduce((sum, p) => sum + p.gamesWritten, 0),
    });
    return summary;
  }

  async scrapePlatform(
    entry: PlatformEntry,
    platformEndpoint: ResolvedEndpoint,
    gameEndpoint: ResolvedEndpoint,
    gamesCount: number,
  ): Promise<PlatformScrapeResult | null> {
    const platform = await this.fetchPlatform(platformEndpoint, entry.id);
    if (!platform) {
      LoggerHelper.logWarning(this.logger, 'Platform lookup', 'no data found', {
        id: entry.id,
        name: entry.name,
      });
      return null;
    }

    const fetched = await this.fetchGames(gameEndpoint, entry.id, gamesCount);
    const games = dedupeById(fetched);
    const folder = await this.writePlatformOutput(
      normalizeRecord(platform),
      games.map(normalizeRecord),
    );

    this.logger.log(`✅ Created output for ${folder}: ${games.length} games`);
    return {
      platformId: entry.id,
      platformName: typeof platform.name === 'string' ? platform.name : entry.name,
      folder,
      gamesWritten: games.length,
      duplicatesRemoved: fetched.length - games.length,
    };
  }

  async fetchPlatform(
    endpoint: ResolvedEndpoint,
    platformId: string,
  ): Promise<IgdbRecord | null> {
    const body = withPage(withIdFilter(endpoint.body, [platformId]), 1, 0);
    const records = await this.igdbApi.query(
      endpoint.endpointUrl,
      body,
      endpoint.httpMethod,
    );
    return records[0] ?? null;
  }

  async fetchGames(
    endpoint: ResolvedEndpoint,
    platformId: string,
    count: number,
  ): Promise<IgdbRecord[]> {
    const batchLimit = this.config.get('IGDB_BATCH_LIMIT', { infer: true });
    const filtered = withPlatformFilter(endpoint.body, platformId);

    const { records } = await collectPaginated(count, batchLimit, (offset, limit) =>
      this.igdbApi.query(
        endpoint.endpointUrl,
        withPage(filtered, limit, offset),
        endpoint.httpMethod,
      ),
    );
    return records;
  }

  /** Writes the platform folder and returns its name. */
  async writePlatformOutput(
    platform: IgdbRecord,
    games: IgdbRecord[],
  ): Promise<string> {
    const folderName = toFolderName(platformLabel(platform), UNKNOWN_PLATFORM_FOLDER);
    const platformFolder = path.join(this.detailDir, folderName);

    const platformImages = await this.imageDownloader.downloadRecordImages(
      platform,
      platformFolder,
    );
    await writeJsonFile(
      path.join(platformFolder, PLATFORM_INFO_FILE),
      addLocalFilePaths(platform, platformImages),
    );

    for (const game of games) {
      const gameFolderName = toFolderName(
        typeof game.name === 'string' ? game.name : null,
        UNKNOWN_GAME_FOLDER,
      );
      const gameFolder = path.join(platformFolder, gameFolderName);
      const gameImages = await this.imageDownloader.downloadRecordImages(game, gameFolder);
      await writeJsonFile(
        path.join(gameFolder, `${gameFolderName}.json`),
        addLocalFilePaths(game, gameImages),
      );
    }

    return folderName;
  }
}

/** name, else abbreviation, else id */
function platformLabel(platform: IgdbRecord): string | null {
  for (const key of ['name', 'abbreviation']) {
    const value = platform[key];
    if (typeof value === 'string' && value.trim()) return value;
  }
  const id = platform.id;
  return typeof id === 'number' || typeof id === 'string' ? String(id) : null;
}
