import { IsNotEmpty, IsObject, IsString, IsUrl } from 'class-validator';

export class ImageConfigDto {
  @IsUrl({ require_tld: false })
  base_url!: string;

  /** Extension including the dot, e.g. `.webp` */
  @IsString()
  @IsNotEmpty()
  file_format!: string;

  /** Image type to IGDB size name, e.g. `cover` -> `t_cover_big` */
  @IsObject()
  image_size_mapping!: Record<string, string>;
}
