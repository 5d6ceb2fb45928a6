import { Injectable, Logger } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { promises as fs } from 'fs';
import * as path from 'path';
import {
  ConfigurationError,
  EntityProcessingError,
} from '../common/errors/pipeline.errors';
import { ErrorHandlerUtil } from '../common/utils/error-handler.util';
import { pathExists, readJsonFile } from '../common/utils/json-file.util';
import { JsonObject, isJsonObject } from '../igdb/igdb.types';
import { PLATFORM_INFO_FILE } from '../scraper/scraper.constants';
import { GameRecordDto, PlatformInfoDto } from './dto/catalogue-record.dto';
import { LoadedGame, LoadedPlatform } from './catalogue.types';

/**
 * Reads the scraped detail tree back. Broken platform or game folders are
 * logged and skipped; everything else is returned sorted by folder name.
 */
@Injectable()
export class CatalogueDataLoader {
  private readonly logger = new Logger(CatalogueDataLoader.name);

  async loadDetailTree(detailDir: string): Promise<LoadedPlatform[]> {
    if (!(await pathExists(detailDir))) {
      throw new ConfigurationError(
        `Detail folder not found: ${detailDir}. Run the scrape command first.`,
      );
    }

    const platforms: LoadedPlatform[] = [];
    for (const folder of await this.listDirectories(detailDir)) {
      const platform = await ErrorHandlerUtil.executeForEntity(
        () => this.loadPlatform(detailDir, folder),
        this.logger,
        folder,
      );
      if (platform) platforms.push(platform);
    }
    return platforms;
  }

  async loadPlatform(detailDir: string, folder: string): Promise<LoadedPlatform> {
    const platformDir = path.join(detailDir, folder);
    const infoPath = path.join(platformDir, PLATFORM_INFO_FILE);
    if (!(await pathExists(infoPath))) {
      throw new EntityProcessingError(`No ${PLATFORM_INFO_FILE} in ${platformDir}`, folder);
    }

    const raw = await this.readObject(infoPath, folder);
    const info = this.toDto(PlatformInfoDto, raw, infoPath, folder);

    const games: LoadedGame[] = [];
    for (const gameFolder of await this.listDirectories(platformDir)) {
      const game = await ErrorHandlerUtil.executeForEntity(
        () => this.loadGame(platformDir, gameFolder),
        this.logger,
        `${folder}/${gameFolder}`,
      );
      if (game) games.push(game);
    }

    return { folder, info, raw, games };
  }

  async loadGame(platformDir: string, folder: string): Promise<LoadedGame> {
    const jsonPath = path.join(platformDir, folder, `${folder}.json`);
    if (!(await pathExists(jsonPath))) {
      throw new EntityProcessingError(`Missing game file ${jsonPath}`, folder);
    }
    const raw = await this.readObject(jsonPath, folder);
    return { folder, record: this.toDto(GameRecordDto, raw, jsonPath, folder), raw };
  }

  private async readObject(filePath: string, entity: string): Promise<JsonObject> {
    const raw = await readJsonFile(filePath);
    if (!isJsonObject(raw)) {
      throw new EntityProcessingError(`${filePath} does not contain an object`, entity);
    }
    return raw;
  }

  private toDto<T extends object>(
    cls: ClassConstructor<T>,
    raw: JsonObject,
    filePath: string,
    entity: string,
  ): T {
    const dto = plainToInstance(cls, raw);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const problems = errors.flatMap((error) => Object.values(error.constraints ?? {}));
      throw new EntityProcessingError(
        `Invalid record in ${filePath}: ${problems.join('; ') || 'nested fields are invalid'}`,
        entity,
      );
    }
    return dto;
  }

  private async listDirectories(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  }
}
