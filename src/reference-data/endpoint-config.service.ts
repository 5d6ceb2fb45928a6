import { Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import {
  ConfigurationError,
  errorMessage,
} from '../common/errors/pipeline.errors';
import { pathExists, readJsonFile } from '../common/utils/json-file.util';
import { appendLimit } from '../igdb/utils/apicalypse-query.util';
import { isJsonObject } from '../igdb/igdb.types';
import { EndpointConfigDto } from './dto/endpoint-config.dto';

export interface ResolvedEndpoint {
  name: string;
  endpointUrl: string;
  countEndpointUrl: string;
  httpMethod: EndpointConfigDto['properties']['http_method'];
  body: string;
}

export interface EndpointLoadResult {
  endpoints: ResolvedEndpoint[];
  warnings: string[];
}

@Injectable()
export class EndpointConfigService {
  private readonly logger = new Logger(EndpointConfigService.name);

  /**
   * Loads a list of endpoint entries. Invalid entries are reported in
   * `warnings` and left out; a missing or unparsable file is fatal.
   */
  async loadEndpoints(filePath: string, batchLimit: number): Promise<EndpointLoadResult> {
    const raw = await this.readConfigFile(filePath);
    const entries = Array.isArray(raw) ? raw : [raw];

    const endpoints: ResolvedEndpoint[] = [];
    const warnings: string[] = [];

    entries.forEach((entry, index) => {
      const label =
        isJsonObject(entry) && typeof entry.name === 'string'
          ? entry.name
          : `#${index}`;
      const problems = this.validate(entry);
      if (problems.length > 0) {
        const warning = `Invalid configuration for endpoint '${label}', skipping: ${problems.join('; ')}`;
        this.logger.warn(`⚠️ ${warning}`);
        warnings.push(warning);
        return;
      }
      endpoints.push(this.resolve(plainToInstance(EndpointConfigDto, entry), batchLimit));
    });

    this.logger.log(`Loaded ${endpoints.length} endpoint configurations from ${filePath}`);
    return { endpoints, warnings };
  }

  /** Loads a file that must hold exactly one valid endpoint entry. */
  async loadSingleEndpoint(filePath: string): Promise<ResolvedEndpoint> {
    const raw = await this.readConfigFile(filePath);
    const problems = this.validate(raw);
    if (problems.length > 0) {
      throw new ConfigurationError(
        `Invalid endpoint configuration in ${filePath}: ${problems.join('; ')}`,
      );
    }
    return this.resolve(plainToInstance(EndpointConfigDto, raw), null);
  }

  validate(entry: unknown): string[] {
    if (!isJsonObject(entry)) return ['entry must be an object'];
    const dto = plainToInstance(EndpointConfigDto, entry);
    return validateSync(dto).flatMap((error) => this.flattenConstraints(error));
  }

  private resolve(dto: EndpointConfigDto, batchLimit: number | null): ResolvedEndpoint {
    const { endpoint_url, count_endpoint_url, http_method, body } = dto.properties;
    return {
      name: dto.name,
      endpointUrl: endpoint_url,
      countEndpointUrl: count_endpoint_url ?? `${endpoint_url.replace(/\/+$/, '')}/count`,
      httpMethod: http_method,
      body: batchLimit === null ? body : appendLimit(body, batchLimit),
    };
  }

  private flattenConstraints(error: ValidationError, prefix = ''): string[] {
    const property = `${prefix}${error.property}`;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => (prefix ? `${prefix}${message}` : message),
    );
    const nested = (error.children ?? []).flatMap((child) =>
      this.flattenConstraints(child, `${property}.`),
    );
    return [...own, ...nested];
  }

  private async readConfigFile(filePath: string): Promise<unknown> {
    if (!(await pathExists(filePath))) {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    try {
      return await readJsonFile(filePath);
    } catch (error) {
      throw new ConfigurationError(errorMessage(error));
    }
  }
}
