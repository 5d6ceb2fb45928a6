import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createWriteStream, promises as fs } from 'fs';
import * as path from 'path';
import PDFDocument from 'pdfkit';
import { finished } from 'stream/promises';
import { EnvironmentVariables } from '../config/environment';
import { ConfigurationError } from '../common/errors/pipeline.errors';
import { ErrorHandlerUtil } from '../common/utils/error-handler.util';
import { toFolderName } from '../common/utils/filename.util';
import { findImageFile, loadAsPng } from '../common/utils/image.util';
import { pathExists } from '../common/utils/json-file.util';
import { findPlatformLogoPath } from '../labels/platform-logo.selector';
import {
  CatalogueDocument,
  LoadedGame,
  LoadedPlatform,
  SelectedGame,
  SelectionResult,
} from './catalogue.types';
import {
  DetailRow,
  gameDetailRows,
  platformInfoRows,
  versionSections,
} from './catalogue-pdf.util';

const PAGE_MARGIN = 50;
const PLATFORM_LOGO_FIT: [number, number] = [216, 144];
const VERSION_LOGO_FIT: [number, number] = [216, 108];
const COVER_FIT: [number, number] = [108, 144];
const COVER_GUTTER = 18;

interface Fonts {
  regular: string;
  bold: string;
}

@Injectable()
export class CataloguePdfService {
  private readonly logger = new Logger(CataloguePdfService.name);

  constructor(private readonly config: ConfigService<EnvironmentVariables, true>) {}

  /**
   * Writes `<Platform>_Catalogue.pdf` into `outputFolder` for every platform
   * of the selection. A platform that fails is logged and skipped.
   */
  async generateAll(
    catalogue: CatalogueDocument,
    platforms: LoadedPlatform[],
    detailDir: string,
    outputFolder: string,
  ): Promise<string[]> {
    const fonts = await this.resolveFonts();
    await fs.mkdir(outputFolder, { recursive: true });

    const byFolder = new Map(platforms.map((platform) => [platform.folder, platform]));
    const files: string[] = [];
    for (const selection of Object.values(catalogue.platforms)) {
      const platform = byFolder.get(selection.platform_folder);
      if (!platform) continue;
      const file = await ErrorHandlerUtil.executeForEntity(
        () => this.generateForPlatform(platform, selection, detailDir, outputFolder, fonts),
        this.logger,
        platform.folder,
      );
      if (file) files.push(file);
    }
    return files;
  }

  async generateForPlatform(
    platform: LoadedPlatform,
    selection: SelectionResult,
    detailDir: string,
    outputFolder: string,
    fonts: Fonts,
  ): Promise<string> {
    const platformDir = path.join(detailDir, platform.folder);
    const pdfPath = path.join(
      outputFolder,
      `${toFolderName(platform.info.name, platform.folder)}_Catalogue.pdf`,
    );

    const doc = new PDFDocument({
      size: 'A4',
      margin: PAGE_MARGIN,
      info: { Title: `${platform.info.name} Catalogue` },
    });
    const stream = createWriteStream(pdfPath);
    doc.pipe(stream);
    try {
      await this.drawPlatformSection(doc, fonts, platform, platformDir);
      await this.drawGamesSection(doc, fonts, platform, selection, platformDir);
    } finally {
      doc.end();
      await finished(stream);
    }

    this.logger.log(`✅ Catalogue for ${platform.info.name}: ${selection.games.length} games`);
    return pdfPath;
  }

  private async resolveFonts(): Promise<Fonts> {
    const fontFile = this.config.get('CATALOGUE_FONT_FILE', { infer: true });
    if (!fontFile) return { regular: 'Helvetica', bold: 'Helvetica-Bold' };
    if (!(await pathExists(fontFile))) {
      throw new ConfigurationError(`Catalogue font not found: ${fontFile}`);
    }
    // pdfkit loads a font file by path; one face serves both weights
    return { regular: fontFile, bold: fontFile };
  }

  private async drawPlatformSection(
    doc: PDFKit.PDFDocument,
    fonts: Fonts,
    platform: LoadedPlatform,
    platformDir: string,
  ): Promise<void> {
    doc.font(fonts.bold).fontSize(24).text(platform.info.name, { align: 'center' });
    doc.moveDown();

    const logoPath = await findPlatformLogoPath(platform.raw, platformDir);
    if (logoPath) {
      await this.drawFlowingImage(doc, logoPath, PLATFORM_LOGO_FIT);
    }

    const rows = platformInfoRows(platform.raw);
    if (rows.length > 0) {
      this.drawRows(doc, fonts, rows);
      doc.moveDown();
    }

    const versions = versionSections(platform.raw);
    if (versions.length === 0) return;

    doc.font(fonts.bold).fontSize(16).text('Platform Versions');
    doc.moveDown(0.5);
    for (const version of versions) {
      doc.font(fonts.bold).fontSize(12).text(version.name);
      if (version.releases.length > 0) {
        doc.font(fonts.bold).fontSize(10).text('Release Information:');
        doc.font(fonts.regular);
        for (const release of version.releases) {
          doc.text(`• ${release}`, { indent: 10 });
        }
        doc.moveDown(0.5);
      }
      if (version.logoFile) {
        const versionLogo = path.join(platformDir, version.logoFile);
        if (await pathExists(versionLogo)) {
          await this.drawFlowingImage(doc, versionLogo, VERSION_LOGO_FIT);
        }
      }
      if (version.summary) {
        doc.font(fonts.regular).fontSize(10).text(version.summary, { align: 'justify' });
      }
      doc.moveDown();
    }
  }

  private async drawGamesSection(
    doc: PDFKit.PDFDocument,
    fonts: Fonts,
    platform: LoadedPlatform,
    selection: SelectionResult,
    platformDir: string,
  ): Promise<void> {
    doc.addPage();
    doc.font(fonts.bold).fontSize(16).text('Games Library');
    doc.moveDown();

    if (selection.games.length === 0) {
      doc.font(fonts.regular).fontSize(10).text('No games selected for this platform.');
      return;
    }

    const byPath = new Map(
      platform.games.map((game) => [path.posix.join(platform.folder, game.folder), game]),
    );
    for (const selected of selection.games) {
      const game = byPath.get(selected.game_folder_path);
      if (!game) continue;
      await this.drawGame(doc, fonts, selected, game, path.join(platformDir, game.folder));
    }
  }

  /** Cover on the left, details on the right. */
  private async drawGame(
    doc: PDFKit.PDFDocument,
    fonts: Fonts,
    selected: SelectedGame,
    game: LoadedGame,
    gameDir: string,
  ): Promise<void> {
    const bottom = doc.page.height - doc.page.margins.bottom;
    if (doc.y + COVER_FIT[1] + 30 > bottom) doc.addPage();

    const left = doc.page.margins.left;
    doc.font(fonts.bold).fontSize(14).text(selected.game_name, left, doc.y);
    doc.moveDown(0.3);
    const top = doc.y;

    const coverPath = await findImageFile(gameDir, game.record.cover?.local_file_path, 'cover_');
    if (coverPath) {
      await ErrorHandlerUtil.executeForEntity(
        async () => {
          const cover = await loadAsPng(coverPath);
          doc.image(cover.data, left, top, { fit: COVER_FIT });
        },
        this.logger,
        coverPath,
      );
    }

    const textX = left + COVER_FIT[0] + COVER_GUTTER;
    const textWidth = doc.page.width - doc.page.margins.right - textX;
    const rows: DetailRow[] = [
      ...gameDetailRows(game.raw),
      { label: 'First Release', value: selected.is_first_release ? 'Yes' : 'No' },
    ];
    doc.x = textX;
    doc.y = top;
    this.drawRows(doc, fonts, rows, textWidth);

    doc.x = left;
    doc.y = Math.max(doc.y, top + COVER_FIT[1]) + 15;
  }

  private drawRows(doc: PDFKit.PDFDocument, fonts: Fonts, rows: DetailRow[], width?: number): void {
    doc.fontSize(10);
    for (const row of rows) {
      doc
        .font(fonts.bold)
        .text(`${row.label}: `, { continued: true, width })
        .font(fonts.regular)
        .text(row.value, { width });
    }
  }

  private async drawFlowingImage(
    doc: PDFKit.PDFDocument,
    imagePath: string,
    fit: [number, number],
  ): Promise<void> {
    const drawn = await ErrorHandlerUtil.executeForEntity(
      async () => {
        const image = await loadAsPng(imagePath);
        doc.image(image.data, { fit, align: 'center' });
        return true;
      },
      this.logger,
      imagePath,
    );
    if (drawn) doc.moveDown();
  }
}
