import { Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { toIsoDate } from '../../common/collector/date.util';

// Dates are normally ISO strings already; unconverted unix seconds are
// accepted and converted here.
const toRecordDate = ({ value }: { value: unknown }) =>
  typeof value === 'string' || typeof value === 'number' ? toIsoDate(value) : null;

export class ImageFileDto {
  @IsOptional()
  @IsString()
  image_id?: string;

  @IsOptional()
  @IsString()
  local_file_path?: string;
}

export class ReleaseDateDto {
  @IsOptional()
  @Transform(toRecordDate)
  @IsString()
  date?: string | null;
}

export class GameRecordDto {
  @IsOptional()
  @IsInt()
  id?: number | null;

  @IsOptional()
  @IsString()
  name?: string | null;

  @IsOptional()
  @Transform(toRecordDate)
  @IsString()
  first_release_date?: string | null;

  @IsOptional()
  @IsNumber()
  rating?: number | null;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ReleaseDateDto)
  release_dates?: ReleaseDateDto[] | null;

  @IsOptional()
  @ValidateNested()
  @Type(() => ImageFileDto)
  cover?: ImageFileDto | null;
}

export class PlatformInfoDto {
  @IsInt()
  id!: number;

  @IsString()
  name!: string;
}
