import { Type } from 'class-transformer';
import {
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

export class CatalogueGameEntryDto {
  @IsString()
  game_name!: string;

  @IsString()
  @IsNotEmpty()
  game_folder_path!: string;

  @IsString()
  @IsNotEmpty()
  reference_json_path!: string;
}

/** The slice of a catalogue platform entry that labels are rendered from. */
export class CataloguePlatformEntryDto {
  @IsString()
  @IsNotEmpty()
  platform_folder!: string;

  @IsOptional()
  @IsString()
  platform_name?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CatalogueGameEntryDto)
  games!: CatalogueGameEntryDto[];
}
