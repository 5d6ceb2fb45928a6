import { Type } from 'class-transformer';
import {
  IsDefined,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  ValidateNested,
} from 'class-validator';
import { HttpMethod } from '../../igdb/igdb.types';

export const HTTP_METHODS: HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

export class EndpointPropertiesDto {
  @IsUrl({ require_tld: false })
  endpoint_url!: string;

  /** Defaults to `<endpoint_url>/count` */
  @IsOptional()
  @IsUrl({ require_tld: false })
  count_endpoint_url?: string;

  @IsIn(HTTP_METHODS)
  http_method: HttpMethod = 'POST';

  @IsString()
  body!: string;
}

/**
 * One entry of an endpoint configuration file.
 *
 * ```json
 * { "name": "platforms",
 *   "properties": { "endpoint_url": "https://api.igdb.com/v4/platforms",
 *                   "http_method": "POST", "body": "fields *;" } }
 * ```
 */
export class EndpointConfigDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsDefined()
  @ValidateNested()
  @Type(() => EndpointPropertiesDto)
  properties!: EndpointPropertiesDto;
}
