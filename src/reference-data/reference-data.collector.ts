import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { EnvironmentVariables } from '../config/environment';
import { collectPaginated } from '../common/collector/paginated-collector';
import { dedupeById } from '../common/collector/dedupe.util';
import {
  TransportError,
  errorMessage,
} from '../common/errors/pipeline.errors';
import { LoggerHelper } from '../common/utils/logger.helper';
import { sanitizeFileName } from '../common/utils/filename.util';
import { writeJsonFile } from '../common/utils/json-file.util';
import { IgdbApiService } from '../igdb/igdb-api.service';
import { withPage } from '../igdb/utils/apicalypse-query.util';
import {
  EndpointConfigService,
  ResolvedEndpoint,
} from './endpoint-config.service';
import {
  EndpointResult,
  OverallStats,
  ReferenceCollectionResult,
} from './reference-data.types';

export const REFERENCE_DATA_DIR = 'reference_data';
export const COLLECTION_STATS_FILE = 'collection_stats.json';
export const COLLECTION_SUMMARY_FILE = 'collection_summary.txt';

/**
 * Collects lookup data (platforms, families, logos, ...) from every
 * configured endpoint: count, then page through, then drop duplicate ids.
 *
 * A transport failure on one endpoint is recorded in the stats and the
 * next endpoint is processed. Configuration problems stop the run.
 */
@Injectable()
export class ReferenceDataCollector {
  private readonly logger = new Logger(ReferenceDataCollector.name);

  constructor(
    private readonly igdbApi: IgdbApiService,
    private readonly endpointConfig: EndpointConfigService,
    private readonly config: ConfigService<EnvironmentVariables, true>,
  ) {}

  get outputDir(): string {
    return path.join(
      this.config.get('OUTPUT_DIR', { infer: true }),
      REFERENCE_DATA_DIR,
    );
  }

  async collectAll(): Promise<ReferenceCollectionResult> {
    const batchLimit = this.config.get('IGDB_BATCH_LIMIT', { infer: true });
    const endpointsFile = this.config.get('REFERENCE_ENDPOINTS_FILE', {
      infer: true,
    });

    LoggerHelper.logStart(this.logger, 'Reference data collection', {
      endpointsFile,
      batchLimit,
    });

    const { endpoints, warnings } = await this.endpointConfig.loadEndpoints(
      endpointsFile,
      batchLimit,
    );

    const results: Record<string, EndpointResult> = {};
    const overall: OverallStats = {
      start_time: new Date().toISOString(),
      end_time: '',
      endpoints_processed: 0,
      total_records_collected: 0,
      successful_endpoints: [],
      failed_endpoints: [],
      warnings: [...warnings],
    };

    for (const endpoint of endpoints) {
      this.logger.log(`Processing endpoint: ${endpoint.name}`);
      try {
        const result = await this.collectEndpoint(endpoint, batchLimit);
        results[endpoint.name] = result;
        overall.endpoints_processed += 1;
        overall.total_records_collected += result.stats.total_records;
        overall.successful_endpoints.push(endpoint.name);
        this.logger.log(
          `✅ Collected ${result.stats.total_records} records from ${endpoint.name}`,
        );
      } catch (error) {
        if (!(error instanceof TransportError)) throw error;
        LoggerHelper.logError(this.logger, `Endpoint ${endpoint.name}`, error);
        overall.failed_endpoints.push({
          endpoint: endpoint.name,
          error: errorMessage(error),
        });
      }
    }

    overall.end_time = new Date().toISOString();
    await this.saveResults(results, overall);

    LoggerHelper.logComplete(this.logger, 'Reference data collection', {
      processed: overall.endpoints_processed,
      records: overall.total_records_collected,
      successful: overall.successful_endpoints.length,
      failed: overall.failed_endpoints.length,
    });

    return { results, stats: overall };
  }

  async collectEndpoint(
    endpoint: ResolvedEndpoint,
    batchLimit: number,
  ): Promise<EndpointResult> {
    const startTime = new Date().toISOString();
    const totalCount = await this.igdbApi.count(endpoint.countEndpointUrl);

    const collected = await collectPaginated(
      totalCount,
      batchLimit,
      (offset, limit) =>
        this.igdbApi.query(
          endpoint.endpointUrl,
          withPage(endpoint.body, limit, offset),
          endpoint.httpMethod,
        ),
    );
    const data = dedupeById(collected.records);

    return {
      data,
      stats: {
        endpoint_name: endpoint.name,
        endpoint_url: endpoint.endpointUrl,
        batches_required: collected.pagesFetched,
        total_records: data.length,
        duplicates_removed: collected.records.length - data.length,
        exhausted_early: collected.exhausted,
        start_time: startTime,
        end_time: new Date().toISOString(),
      },
    };
  }

  private async saveResults(
    results: Record<string, EndpointResult>,
    overall: OverallStats,
  ): Promise<void> {
    const outputDir = this.outputDir;
    await fs.mkdir(outputDir, { recursive: true });

    for (const [name, result] of Object.entries(results)) {
      if (result.data.length === 0) continue;
      const fileName = sanitizeFileName(`${name}.json`);
      await writeJsonFile(path.join(outputDir, fileName), result.data);
      this.logger.log(`Saved ${result.data.length} records to ${fileName}`);
    }

    const endpointStats = Object.fromEntries(
      Object.entries(results).map(([name, result]) => [name, result.stats]),
    );
    await writeJsonFile(path.join(outputDir, COLLECTION_STATS_FILE), {
      overall,
      endpoints: endpointStats,
    });

    await fs.writeFile(
      path.join(outputDir, COLLECTION_SUMMARY_FILE),
      formatSummary(overall),
      'utf-8',
    );
  }
}

export function formatSummary(overall: OverallStats): string {
  const lines = [
    'IGDB Reference Data Collection Summary',
    '='.repeat(40),
    '',
    `Collection started: ${overall.start_time}`,
    `Collection ended: ${overall.end_time}`,
    '',
    `Endpoints processed: ${overall.endpoints_processed}`,
    `Total records collected: ${overall.total_records_collected}`,
    '',
    `Successful endpoints (${overall.successful_endpoints.length}):`,
    ...overall.successful_endpoints.map((name) => `  ✓ ${name}`),
  ];

  if (overall.failed_endpoints.length > 0) {
    lines.push('', `Failed endpoints (${overall.failed_endpoints.length}):`);
    lines.push(
      ...overall.failed_endpoints.map(
        (failed) => `  ✗ ${failed.endpoint}: ${failed.error}`,
      ),
    );
  }

  if (overall.warnings.length > 0) {
    lines.push('', `Warnings (${overall.warnings.length}):`);
    lines.push(...overall.warnings.map((warning) => `  ⚠ ${warning}`));
  }

  return `${lines.join('\n')}\n`;
}
