import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { load } from 'cheerio';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { createWriteStream, promises as fs } from 'fs';
import * as path from 'path';
import PDFDocument from 'pdfkit';
import { finished } from 'stream/promises';
import { EnvironmentVariables, LabelFormat } from '../config/environment';
import {
  ConfigurationError,
  EntityProcessingError,
  errorMessage,
} from '../common/errors/pipeline.errors';
import { ErrorHandlerUtil } from '../common/utils/error-handler.util';
import { LoggerHelper } from '../common/utils/logger.helper';
import { toFolderName } from '../common/utils/filename.util';
import {
  PngImage,
  findImageFile,
  loadAsPng,
  rasterizeSvg,
  toPngDataUrl,
} from '../common/utils/image.util';
import { pathExists, readJsonFile } from '../common/utils/json-file.util';
import { isJsonObject } from '../igdb/igdb.types';
import { CATALOGUE_DIR, CATALOGUE_FILE } from '../catalogue/catalogue.service';
import { GameRecordDto } from '../catalogue/dto/catalogue-record.dto';
import { DETAIL_DIR, PLATFORM_INFO_FILE } from '../scraper/scraper.constants';
import {
  CatalogueGameEntryDto,
  CataloguePlatformEntryDto,
} from './dto/catalogue-entry.dto';
import { findPlatformLogoPath } from './platform-logo.selector';

export const LABELS_DIR = 'labels';

export const TEMPLATE_IDS = {
  cover: 'cover-placeholder',
  platformLogo: 'platform_logo-placeholder',
  gameName: 'game_name',
  platformName: 'platform_name',
} as const;

/** Points per inch in PDF user space. */
const PDF_POINTS_PER_INCH = 72;

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface LabelContent {
  gameName: string;
  platformName: string;
  coverPath: string | null;
  logoPath: string | null;
}

export interface LabelRunSummary {
  platforms: number;
  labelsGenerated: number;
  files: string[];
}

/** Largest box of the image's aspect ratio centred inside `box`. */
export function fitImageToBox(box: Box, imageWidth: number, imageHeight: number): Box {
  if (imageWidth <= 0 || imageHeight <= 0 || box.width <= 0 || box.height <= 0) {
    return { ...box };
  }
  const imageAspect = imageWidth / imageHeight;
  const width = imageAspect > box.width / box.height ? box.width : box.height * imageAspect;
  const height = width / imageAspect;
  return {
    x: box.x + (box.width - width) / 2,
    y: box.y + (box.height - height) / 2,
    width,
    height,
  };
}

function numberAttr(value: string | undefined): number {
  const parsed = Number.parseFloat(value ?? '');
  return Number.isFinite(parsed) ? parsed : 0;
}

@Injectable()
export class LabelGeneratorService {
  private readonly logger = new Logger(LabelGeneratorService.name);
  private template: string | null = null;

  constructor(private readonly config: ConfigService<EnvironmentVariables, true>) {}

  get outputDir(): string {
    return this.config.get('OUTPUT_DIR', { infer: true });
  }

  async loadTemplate(): Promise<string> {
    if (this.template !== null) return this.template;
    const templatePath = this.config.get('LABEL_TEMPLATE_FILE', { infer: true });
    if (!(await pathExists(templatePath))) {
      throw new ConfigurationError(`Label template not found: ${templatePath}`);
    }
    this.template = await fs.readFile(templatePath, 'utf-8');
    return this.template;
  }

  /** Renders a label for every game selected in the catalogue. */
  async generateFromCatalogue(): Promise<LabelRunSummary> {
    const cataloguePath = path.join(this.outputDir, CATALOGUE_DIR, CATALOGUE_FILE);
    const entries = await this.loadCatalogueEntries(cataloguePath);
    const detailDir = path.join(this.outputDir, DETAIL_DIR);

    LoggerHelper.logStart(this.logger, 'Label generation', { platforms: entries.length });
    const summary: LabelRunSummary = { platforms: 0, labelsGenerated: 0, files: [] };

    for (const entry of entries) {
      const files = await ErrorHandlerUtil.executeForEntity(
        () => this.generateForPlatform(entry, detailDir),
        this.logger,
        entry.platform_folder,
      );
      if (!files) continue;
      summary.platforms += 1;
      summary.files.push(...files);
    }

    summary.labelsGenerated = summary.files.length;
    LoggerHelper.logComplete(this.logger, 'Label generation', {
      platforms: summary.platforms,
      files: summary.labelsGenerated,
    });
    return summary;
  }

  async generateForPlatform(
    entry: CataloguePlatformEntryDto,
    detailDir: string,
  ): Promise<string[]> {
    const platformFolder = path.join(detailDir, entry.platform_folder);
    const infoPath = path.join(platformFolder, PLATFORM_INFO_FILE);
    if (!(await pathExists(infoPath))) {
      throw new EntityProcessingError(`No ${PLATFORM_INFO_FILE} in ${platformFolder}`, entry.platform_folder);
    }
    const platformInfo = await readJsonFile(infoPath);
    if (!isJsonObject(platformInfo)) {
      throw new EntityProcessingError(`${infoPath} does not contain an object`, entry.platform_folder);
    }

    const platformName =
      typeof platformInfo.name === 'string'
        ? platformInfo.name
        : entry.platform_name ?? entry.platform_folder;
    const logoPath = await findPlatformLogoPath(platformInfo, platformFolder);
    if (!logoPath) {
      LoggerHelper.logWarning(this.logger, 'Platform logo', 'none found', { platform: platformName });
    }

    const outputFolder = path.join(this.outputDir, LABELS_DIR, entry.platform_folder);
    const files: string[] = [];
    for (const game of entry.games) {
      const written = await ErrorHandlerUtil.executeForEntity(
        () => this.generateForGame(game, detailDir, platformName, logoPath, outputFolder),
        this.logger,
        game.game_folder_path,
      );
      if (written) files.push(...written);
    }

    this.logger.log(`✅ Generated ${files.length} label files for ${platformName}`);
    return files;
  }

  async generateForGame(
    game: CatalogueGameEntryDto,
    detailDir: string,
    platformName: string,
    logoPath: string | null,
    outputFolder: string,
  ): Promise<string[]> {
    const gameFolder = path.join(detailDir, game.game_folder_path);
    const jsonPath = path.join(detailDir, game.reference_json_path);
    if (!(await pathExists(jsonPath))) {
      throw new EntityProcessingError(`Missing game file ${jsonPath}`, game.game_folder_path);
    }
    const raw = await readJsonFile(jsonPath);
    if (!isJsonObject(raw)) {
      throw new EntityProcessingError(`${jsonPath} does not contain an object`, game.game_folder_path);
    }
    const record = plainToInstance(GameRecordDto, raw);
    const gameName = record.name ?? game.game_name;

    const coverPath = await findImageFile(gameFolder, record.cover?.local_file_path, 'cover_');
    if (!coverPath) {
      LoggerHelper.logWarning(this.logger, 'Cover image', 'none found', { game: gameName });
    }

    const svg = await this.renderSvg({ gameName, platformName, coverPath, logoPath });
    const baseName = `${toFolderName(platformName, 'platform')}_${toFolderName(gameName, 'game')}_label`;
    return this.writeOutputs(svg, outputFolder, baseName);
  }

  /**
   * Fills the template: each image placeholder is replaced by the image,
   * embedded as PNG and fitted to its box, text elements get the names.
   * A placeholder stays as it is when its image is missing.
   */
  async renderSvg(content: LabelContent): Promise<string> {
    const $ = load(await this.loadTemplate(), { xml: true });

    const substitutions: Array<[string, string | null]> = [
      [TEMPLATE_IDS.cover, content.coverPath],
      [TEMPLATE_IDS.platformLogo, content.logoPath],
    ];
    for (const [id, imagePath] of substitutions) {
      const placeholder = $(`[id="${id}"]`).first();
      if (placeholder.length === 0 || !imagePath) continue;

      const image = await loadAsPng(imagePath);
      const box = fitImageToBox(
        {
          x: numberAttr(placeholder.attr('x')),
          y: numberAttr(placeholder.attr('y')),
          width: numberAttr(placeholder.attr('width')),
          height: numberAttr(placeholder.attr('height')),
        },
        image.width,
        image.height,
      );
      const dataUrl = toPngDataUrl(image);
      const element = $('<image/>').attr({
        id,
        x: String(box.x),
        y: String(box.y),
        width: String(box.width),
        height: String(box.height),
        href: dataUrl,
        'xlink:href': dataUrl,
      });
      placeholder.replaceWith(element);
    }

    $(`[id="${TEMPLATE_IDS.gameName}"]`).text(content.gameName);
    $(`[id="${TEMPLATE_IDS.platformName}"]`).text(content.platformName);
    return $.xml();
  }

  async writeOutputs(svg: string, outputFolder: string, baseName: string): Promise<string[]> {
    const formats: LabelFormat[] = this.config.get('LABEL_FORMATS', { infer: true });
    const dpi = this.config.get('LABEL_DPI', { infer: true });
    await fs.mkdir(outputFolder, { recursive: true });

    const written: string[] = [];
    if (formats.includes('svg')) {
      const svgPath = path.join(outputFolder, `${baseName}.svg`);
      await fs.writeFile(svgPath, svg, 'utf-8');
      written.push(svgPath);
    }
    if (formats.includes('png') || formats.includes('pdf')) {
      const raster = await rasterizeSvg(svg, dpi);
      if (formats.includes('png')) {
        const pngPath = path.join(outputFolder, `${baseName}.png`);
        await fs.writeFile(pngPath, raster.data);
        written.push(pngPath);
      }
      if (formats.includes('pdf')) {
        const pdfPath = path.join(outputFolder, `${baseName}.pdf`);
        await this.writePdf(raster, dpi, pdfPath);
        written.push(pdfPath);
      }
    }
    return written;
  }

  /** One page the physical size of the label, holding the rendered raster. */
  private async writePdf(raster: PngImage, dpi: number, pdfPath: string): Promise<void> {
    const width = (raster.width * PDF_POINTS_PER_INCH) / dpi;
    const height = (raster.height * PDF_POINTS_PER_INCH) / dpi;
    const doc = new PDFDocument({ size: [width, height], margin: 0 });
    const stream = createWriteStream(pdfPath);
    doc.pipe(stream);
    doc.image(raster.data, 0, 0, { width, height });
    doc.end();
    await finished(stream);
  }

  private async loadCatalogueEntries(cataloguePath: string): Promise<CataloguePlatformEntryDto[]> {
    if (!(await pathExists(cataloguePath))) {
      throw new ConfigurationError(
        `Catalogue not found: ${cataloguePath}. Run the catalogue command first.`,
      );
    }
    let raw: unknown;
    try {
      raw = await readJsonFile(cataloguePath);
    } catch (error) {
      throw new ConfigurationError(errorMessage(error));
    }
    if (!isJsonObject(raw) || !isJsonObject(raw.platforms)) {
      throw new ConfigurationError(`${cataloguePath} has no 'platforms' object`);
    }

    const entries: CataloguePlatformEntryDto[] = [];
    for (const [key, value] of Object.entries(raw.platforms)) {
      const entry = isJsonObject(value)
        ? plainToInstance(CataloguePlatformEntryDto, value)
        : null;
      if (!entry || validateSync(entry).length > 0) {
        LoggerHelper.logWarning(this.logger, 'Catalogue entry', 'invalid, skipping', { platform: key });
        continue;
      }
      entries.push(entry);
    }
    return entries;
  }
}
