import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { promises as fs } from 'fs';
import * as path from 'path';
import { firstValueFrom } from 'rxjs';
import { EnvironmentVariables } from '../config/environment';
import {
  ConfigurationError,
  errorMessage,
} from '../common/errors/pipeline.errors';
import { ErrorHandlerUtil } from '../common/utils/error-handler.util';
import { sanitizeFileName } from '../common/utils/filename.util';
import { pathExists, readJsonFile } from '../common/utils/json-file.util';
import {
  IgdbImageRef,
  JsonValue,
  isImageRef,
  isJsonObject,
} from '../igdb/igdb.types';
import { ImageConfigDto } from './dto/image-config.dto';
import { ImageCropperService } from './image-cropper.service';

/**
 * Field names under which IGDB nests image objects, mapped to the image
 * type used for size lookup and file naming. Keys not listed here are
 * taken as their own type.
 */
export const IMAGE_FIELD_ALIASES: Readonly<Record<string, string>> = {
  cover: 'cover',
  covers: 'cover',
  artwork: 'artwork',
  artworks: 'artwork',
  screenshot: 'screenshot',
  screenshots: 'screenshot',
  platform_logo: 'platform_logo',
  platform_logos: 'platform_logo',
  logo: 'company_logo',
  company_logo: 'company_logo',
  company_logos: 'company_logo',
};

export const PLATFORM_LOGO_TYPE = 'platform_logo';

export function resolveImageType(fieldName: string): string {
  return IMAGE_FIELD_ALIASES[fieldName] ?? fieldName;
}

export interface ImageTarget {
  type: string;
  image: IgdbImageRef;
}

/** image_id -> file name relative to the record's folder */
export type DownloadedFiles = Record<string, string>;

/**
 * Every image object in a record, typed by the field that holds it.
 * Repeated image ids are reported once.
 */
export function findImageObjects(record: JsonValue): ImageTarget[] {
  const targets: ImageTarget[] = [];
  const seen = new Set<string>();

  const visit = (value: JsonValue, fieldName: string | null): void => {
    if (Array.isArray(value)) {
      value.forEach((item) => visit(item, fieldName));
      return;
    }
    if (!isJsonObject(value)) return;

    if (fieldName !== null && isImageRef(value)) {
      if (!seen.has(value.image_id)) {
        seen.add(value.image_id);
        targets.push({ type: resolveImageType(fieldName), image: value });
      }
      return;
    }

    for (const [key, child] of Object.entries(value)) {
      visit(child, key);
    }
  };

  visit(record, null);
  return targets;
}

/** Copy of the value with `local_file_path` set on every downloaded image. */
export function addLocalFilePaths(
  value: JsonValue,
  downloaded: DownloadedFiles,
): JsonValue {
  if (Array.isArray(value)) {
    return value.map((item) => addLocalFilePaths(item, downloaded));
  }
  if (!isJsonObject(value)) return value;

  const copy: { [key: string]: JsonValue } = {};
  for (const [key, child] of Object.entries(value)) {
    copy[key] = addLocalFilePaths(child, downloaded);
  }
  const imageId = value.image_id;
  if (typeof imageId === 'string' && downloaded[imageId]) {
    copy.local_file_path = downloaded[imageId];
  }
  return copy;
}

@Injectable()
export class ImageDownloaderService {
  private readonly logger = new Logger(ImageDownloaderService.name);
  private imageConfig: ImageConfigDto | null = null;
  private readonly warnedTypes = new Set<string>();

  constructor(
    private readonly httpService: HttpService,
    private readonly cropper: ImageCropperService,
    private readonly config: ConfigService<EnvironmentVariables, true>,
  ) {}

  async loadImageConfig(): Promise<ImageConfigDto> {
    if (this.imageConfig) return this.imageConfig;

    const filePath = this.config.get('IMAGE_CONFIG_FILE', { infer: true });
    if (!(await pathExists(filePath))) {
      throw new ConfigurationError(`Image config file not found: ${filePath}`);
    }

    let raw: unknown;
    try {
      raw = await readJsonFile(filePath);
    } catch (error) {
      throw new ConfigurationError(errorMessage(error));
    }

    const dto = plainToInstance(ImageConfigDto, raw);
    const errors = validateSync(dto);
    if (!isJsonObject(raw) || errors.length > 0) {
      const problems = errors.flatMap((error) => Object.values(error.constraints ?? {}));
      throw new ConfigurationError(
        `Invalid image config in ${filePath}: ${problems.join('; ') || 'expected an object'}`,
      );
    }

    this.imageConfig = dto;
    return dto;
  }

  buildImageUrl(imageConfig: ImageConfigDto, sizeName: string, imageId: string): string {
    return [
      imageConfig.base_url.replace(/\/+$/, ''),
      sizeName,
      `${imageId}${imageConfig.file_format}`,
    ].join('/');
  }

  buildFileName(imageConfig: ImageConfigDto, target: ImageTarget): string {
    const { id } = target.image;
    const objectId = typeof id === 'number' || typeof id === 'string' ? id : 'unknown';
    return sanitizeFileName(
      `${target.type}_${objectId}_${target.image.image_id}${imageConfig.file_format}`,
    );
  }

  /**
   * Downloads the images of the enabled media types into `folder`.
   * A failed download aborts the step; nothing is retried.
   */
  async downloadRecordImages(record: JsonValue, folder: string): Promise<DownloadedFiles> {
    const imageConfig = await this.loadImageConfig();
    const mediaTypes = new Set(this.config.get('MEDIA_TYPES', { infer: true }));
    const cropLogos = this.config.get('CROP_PLATFORM_LOGOS', { infer: true });

    const downloaded: DownloadedFiles = {};
    for (const target of findImageObjects(record)) {
      if (!mediaTypes.has(target.type)) continue;

      const sizeName = imageConfig.image_size_mapping[target.type];
      if (!sizeName) {
        this.warnUnmappedType(target.type);
        continue;
      }

      const url = this.buildImageUrl(imageConfig, sizeName, target.image.image_id);
      const fileName = this.buildFileName(imageConfig, target);
      const filePath = path.join(folder, fileName);
      await this.downloadImage(url, filePath);

      if (cropLogos && target.type === PLATFORM_LOGO_TYPE) {
        await ErrorHandlerUtil.executeForEntity(
          () => this.cropper.cropTransparentBorders(filePath),
          this.logger,
          fileName,
        );
      }
      downloaded[target.image.image_id] = fileName;
    }

    return downloaded;
  }

  async downloadImage(url: string, filePath: string): Promise<void> {
    const response = await ErrorHandlerUtil.executeApiCall(
      () =>
        firstValueFrom(
          this.httpService.get<ArrayBuffer>(url, { responseType: 'arraybuffer' }),
        ),
      this.logger,
      'Image download',
      url,
    );
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, Buffer.from(response.data));
  }

  private warnUnmappedType(type: string): void {
    if (this.warnedTypes.has(type)) return;
    this.warnedTypes.add(type);
    this.logger.warn(`⚠️ No size mapping for image type '${type}', skipping these images`);
  }
}
