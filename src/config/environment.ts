import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from '../common/errors/pipeline.errors';
import { IGDB_LIMITS } from '../igdb/config/igdb.config';

export const LABEL_FORMATS = ['svg', 'png', 'pdf'] as const;
export type LabelFormat = (typeof LABEL_FORMATS)[number];

const toInt = ({ value }: { value: unknown }) => {
  if (typeof value === 'number') return Math.trunc(value);
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : value;
  }
  return value;
};

const toBoolean = ({ value }: { value: unknown }) => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    return lowered === 'true' || lowered === '1' || lowered === 'yes';
  }
  if (typeof value === 'number') return value === 1;
  return value;
};

const toList = ({ value }: { value: unknown }) => {
  if (Array.isArray(value)) return value;
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  return value;
};

export class EnvironmentVariables {
  @IsString()
  IGDB_CONFIG_DIR = './.config';

  @Transform(toInt)
  @IsInt()
  @Min(1000)
  IGDB_API_TIMEOUT_MS: number = IGDB_LIMITS.defaultTimeoutMs;

  @Transform(toInt)
  @IsInt()
  @Min(1)
  @Max(IGDB_LIMITS.maxPageSize)
  IGDB_BATCH_LIMIT: number = IGDB_LIMITS.defaultPageSize;

  @IsString()
  REFERENCE_ENDPOINTS_FILE = './config/igdb_platform_endpoints.json';

  @IsString()
  PLATFORM_ENDPOINT_FILE = './config/platform_endpoint.json';

  @IsString()
  GAME_ENDPOINT_FILE = './config/game_endpoint.json';

  @IsString()
  IMAGE_CONFIG_FILE = './config/image_config.json';

  @IsString()
  PLATFORMS_FILE = './config/platforms.csv';

  @IsString()
  LABEL_TEMPLATE_FILE = './config/label_template.svg';

  @IsString()
  OUTPUT_DIR = './output';

  @Transform(toInt)
  @IsInt()
  @Min(1)
  GAMES_PER_PLATFORM = 50;

  @Transform(toInt)
  @IsInt()
  @Min(1)
  CATALOGUE_QUOTA = 20;

  @Transform(toBoolean)
  @IsBoolean()
  CATALOGUE_PDF = true;

  /** TrueType font for catalogue text; empty keeps the built-in Helvetica. */
  @IsString()
  CATALOGUE_FONT_FILE = '';

  @Transform(toList)
  @IsString({ each: true })
  MEDIA_TYPES: string[] = ['cover', 'platform_logo'];

  @Transform(toBoolean)
  @IsBoolean()
  CROP_PLATFORM_LOGOS = true;

  @Transform(toInt)
  @IsInt()
  @Min(72)
  @Max(1200)
  LABEL_DPI = 300;

  @Transform(toList)
  @IsIn(LABEL_FORMATS, { each: true })
  LABEL_FORMATS: LabelFormat[] = ['svg', 'png'];
}

/**
 * ConfigModule `validate` hook: fills defaults, coerces strings from the
 * environment and rejects the whole run on any invalid value.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const problems = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new ConfigurationError(
      `Invalid environment configuration: ${problems.join('; ')}`,
      undefined,
      { problems },
    );
  }

  return validated;
}
