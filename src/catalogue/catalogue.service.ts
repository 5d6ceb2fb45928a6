import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import { EnvironmentVariables } from '../config/environment';
import { LoggerHelper } from '../common/utils/logger.helper';
import { writeJsonFile } from '../common/utils/json-file.util';
import { DETAIL_DIR } from '../scraper/scraper.constants';
import { CatalogueDataLoader } from './catalogue-data.loader';
import { CataloguePdfService } from './catalogue-pdf.service';
import {
  CatalogueDocument,
  CatalogueMetadata,
  LoadedPlatform,
  SelectedGame,
  SelectionResult,
} from './catalogue.types';
import {
  OwnershipMap,
  buildOwnershipMap,
  earliestDate,
} from './first-release.resolver';
import { selectQuota } from './quota.selector';

export const CATALOGUE_DIR = 'catalogue';
export const CATALOGUE_FILE = 'catalogue.json';
export const SELECTION_CRITERIA =
  'first-release games by rating, topped up with duplicates by rating';

function percentage(part: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((part / total) * 1000) / 10;
}

@Injectable()
export class CatalogueService {
  private readonly logger = new Logger(CatalogueService.name);

  constructor(
    private readonly loader: CatalogueDataLoader,
    private readonly pdf: CataloguePdfService,
    private readonly config: ConfigService<EnvironmentVariables, true>,
  ) {}

  get cataloguePath(): string {
    return path.join(
      this.config.get('OUTPUT_DIR', { infer: true }),
      CATALOGUE_DIR,
      CATALOGUE_FILE,
    );
  }

  async generate(): Promise<CatalogueDocument> {
    const outputDir = this.config.get('OUTPUT_DIR', { infer: true });
    const quota = this.config.get('CATALOGUE_QUOTA', { infer: true });

    LoggerHelper.logStart(this.logger, 'Catalogue generation', { quota });
    const detailDir = path.join(outputDir, DETAIL_DIR);
    const platforms = await this.loader.loadDetailTree(detailDir);
    const catalogue = this.buildCatalogue(platforms, quota);

    await writeJsonFile(this.cataloguePath, catalogue);
    const documents = this.config.get('CATALOGUE_PDF', { infer: true })
      ? await this.pdf.generateAll(
          catalogue,
          platforms,
          detailDir,
          path.join(outputDir, CATALOGUE_DIR),
        )
      : [];
    LoggerHelper.logComplete(this.logger, 'Catalogue generation', {
      platforms: catalogue.metadata.total_platforms,
      games: catalogue.metadata.total_games_selected,
      firstRelease: `${catalogue.metadata.first_release_percentage}%`,
      file: this.cataloguePath,
      documents: documents.length,
    });
    return catalogue;
  }

  /**
   * Ownership is resolved over every platform before any platform's quota
   * is drawn, so a game shared by several platforms counts as a first
   * release only on the one that released it first.
   */
  buildCatalogue(
    platforms: LoadedPlatform[],
    quota: number,
    generatedAt: Date = new Date(),
  ): CatalogueDocument {
    const ownership = buildOwnershipMap(
      platforms.map((platform) => ({
        group: { id: platform.info.id, name: platform.info.name },
        games: platform.games.map((game) => game.record),
      })),
    );
    this.logger.log(`Ownership map covers ${ownership.size} games`);

    const selectionDate = generatedAt.toISOString();
    const results: Record<string, SelectionResult> = {};
    for (const platform of platforms) {
      results[platform.folder] = this.selectForPlatform(
        platform,
        ownership,
        quota,
        selectionDate,
      );
    }

    return {
      metadata: this.buildMetadata(Object.values(results), quota, selectionDate),
      platforms: results,
    };
  }

  selectForPlatform(
    platform: LoadedPlatform,
    ownership: OwnershipMap,
    quota: number,
    selectionDate: string,
  ): SelectionResult {
    const pool = platform.games.map((game): SelectedGame & { isPreferred: boolean } => {
      const isFirstRelease = ownership.isFirstRelease(game.record.id, platform.info.id);
      const gameFolderPath = path.posix.join(platform.folder, game.folder);
      return {
        game_id: game.record.id ?? null,
        game_name: game.record.name ?? game.folder,
        rating: game.record.rating ?? 0,
        release_date: earliestDate(game.record),
        is_first_release: isFirstRelease,
        reference_json_path: path.posix.join(gameFolderPath, `${game.folder}.json`),
        game_folder_path: gameFolderPath,
        platform_folder: platform.folder,
        isPreferred: isFirstRelease,
      };
    });

    if (pool.length === 0) {
      LoggerHelper.logWarning(this.logger, 'Selection', 'no eligible games', {
        platform: platform.info.name,
      });
    }

    const { selected, fromPreferred, fromOther } = selectQuota(pool, quota);
    return {
      platform_id: platform.info.id,
      platform_name: platform.info.name,
      platform_folder: platform.folder,
      total_eligible_games: pool.length,
      selected_count: selected.length,
      first_release_count: fromPreferred,
      duplicate_count: fromOther,
      games: selected.map(({ isPreferred: _preferred, ...game }) => game),
      selection_date: selectionDate,
    };
  }

  private buildMetadata(
    results: SelectionResult[],
    quota: number,
    generatedAt: string,
  ): CatalogueMetadata {
    const totalSelected = results.reduce((sum, r) => sum + r.selected_count, 0);
    const firstRelease = results.reduce((sum, r) => sum + r.first_release_count, 0);
    const duplicates = results.reduce((sum, r) => sum + r.duplicate_count, 0);

    return {
      generated_at: generatedAt,
      total_platforms: results.length,
      games_per_platform: quota,
      selection_criteria: SELECTION_CRITERIA,
      total_games_selected: totalSelected,
      total_first_release_games: firstRelease,
      total_duplicate_games: duplicates,
      first_release_percentage: percentage(firstRelease, totalSelected),
      duplicate_percentage: percentage(duplicates, totalSelected),
    };
  }
}
