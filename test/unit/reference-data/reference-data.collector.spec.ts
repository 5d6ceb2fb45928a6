import { promises as fs } from 'fs';
import * as path from 'path';
import {
  ConfigurationError,
  TransportError,
} from '../../../src/common/errors/pipeline.errors';
import { IgdbApiService } from '../../../src/igdb/igdb-api.service';
import { TokenManagerService } from '../../../src/igdb/token-manager.service';
import { EndpointConfigService } from '../../../src/reference-data/endpoint-config.service';
import {
  ReferenceDataCollector,
  formatSummary,
} from '../../../src/reference-data/reference-data.collector';
import { OverallStats } from '../../../src/reference-data/reference-data.types';
import {
  createHttpService,
  createTempDir,
  createTestConfig,
  readJson,
  removeDir,
  writeJson,
} from '../helpers/test-context';

const endpoint = (name: string) => ({
  name,
  properties: {
    endpoint_url: `https://api.igdb.com/v4/${name}`,
    http_method: 'POST',
    body: 'fields *; sort id asc;',
  },
});

const PLATFORM_PAGES: Record<number, Array<{ id: number }>> = {
  0: [{ id: 1 }, { id: 2 }],
  2: [{ id: 2 }, { id: 3 }],
  4: [{ id: 4 }],
};

describe('ReferenceDataCollector', () => {
  let outputDir: string;

  const createCollector = async () => {
    const endpointsFile = path.join(outputDir, 'endpoints.json');
    await writeJson(endpointsFile, [
      endpoint('platforms'),
      endpoint('platform_logos'),
      { name: 'invalid' },
      endpoint('platform_types'),
    ]);
    const config = createTestConfig({
      OUTPUT_DIR: outputDir,
      REFERENCE_ENDPOINTS_FILE: endpointsFile,
      IGDB_BATCH_LIMIT: 2,
    });
    const http = createHttpService();
    const api = new IgdbApiService(http, new TokenManagerService(http, config));
    const count = jest.spyOn(api, 'count');
    const query = jest.spyOn(api, 'query');
    const collector = new ReferenceDataCollector(api, new EndpointConfigService(), config);
    return { collector, count, query };
  };

  beforeEach(async () => {
    outputDir = await createTempDir('reference');
  });

  afterEach(async () => {
    await removeDir(outputDir);
  });

  it('collects every endpoint, records failures and writes the outputs', async () => {
    const { collector, count, query } = await createCollector();
    count.mockImplementation(async (url) => {
      if (url.includes('platform_logos')) {
        throw new TransportError('IGDB request failed: HTTP 500', 500, url);
      }
      return url.endsWith('/platforms/count') ? 5 : 0;
    });
    query.mockImplementation(async (_url, body) => {
      const offset = Number(/offset (\d+);/.exec(body)?.[1]);
      return PLATFORM_PAGES[offset] ?? [];
    });

    const { results, stats } = await collector.collectAll();

    expect(query).toHaveBeenNthCalledWith(
      3,
      'https://api.igdb.com/v4/platforms',
      'fields *; sort id asc; limit 1; offset 4;',
      'POST',
    );
    expect(results.platforms.data).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }, { id: 4 }]);
    expect(results.platforms.stats).toMatchObject({
      endpoint_name: 'platforms',
      batches_required: 3,
      total_records: 4,
      duplicates_removed: 1,
      exhausted_early: false,
    });
    expect(stats).toMatchObject({
      endpoints_processed: 2,
      total_records_collected: 4,
      successful_endpoints: ['platforms', 'platform_types'],
      failed_endpoints: [
        { endpoint: 'platform_logos', error: 'IGDB request failed: HTTP 500' },
      ],
    });
    expect(stats.warnings).toHaveLength(1);

    const referenceDir = path.join(outputDir, 'reference_data');
    await expect(readJson(path.join(referenceDir, 'platforms.json'))).resolves.toEqual(
      results.platforms.data,
    );
    await expect(fs.access(path.join(referenceDir, 'platform_types.json'))).rejects.toThrow();
    await expect(readJson(path.join(referenceDir, 'collection_stats.json'))).resolves.toMatchObject({
      overall: { successful_endpoints: ['platforms', 'platform_types'] },
      endpoints: { platforms: { total_records: 4 }, platform_types: { total_records: 0 } },
    });
    const summary = await fs.readFile(path.join(referenceDir, 'collection_summary.txt'), 'utf-8');
    expect(summary).toBe(formatSummary(stats));
  });

  it('marks an endpoint that runs dry before its count', async () => {
    const { collector, count, query } = await createCollector();
    count.mockResolvedValue(10);
    query.mockResolvedValueOnce([{ id: 1 }, { id: 2 }]).mockResolvedValueOnce([{ id: 3 }]);

    const result = await collector.collectEndpoint(
      {
        name: 'platforms',
        endpointUrl: 'https://api.igdb.com/v4/platforms',
        countEndpointUrl: 'https://api.igdb.com/v4/platforms/count',
        httpMethod: 'POST',
        body: 'fields *;',
      },
      2,
    );

    expect(result.data).toHaveLength(3);
    expect(result.stats).toMatchObject({ batches_required: 2, exhausted_early: true });
  });

  it('stops the run on errors other than transport failures', async () => {
    const { collector, count } = await createCollector();
    count.mockRejectedValue(new ConfigurationError('credentials missing'));

    await expect(collector.collectAll()).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('formatSummary', () => {
  it('lists successes, failures and warnings', () => {
    const stats: OverallStats = {
      start_time: '2024-01-01T00:00:00.000Z',
      end_time: '2024-01-01T00:01:00.000Z',
      endpoints_processed: 1,
      total_records_collected: 12,
      successful_endpoints: ['platforms'],
      failed_endpoints: [{ endpoint: 'platform_logos', error: 'HTTP 500' }],
      warnings: ['bad entry'],
    };

    expect(formatSummary(stats)).toBe(
      [
        'IGDB Reference Data Collection Summary',
        '========================================',
        '',
        'Collection started: 2024-01-01T00:00:00.000Z',
        'Collection ended: 2024-01-01T00:01:00.000Z',
        '',
        'Endpoints processed: 1',
        'Total records collected: 12',
        '',
        'Successful endpoints (1):',
        '  ✓ platforms',
        '',
        'Failed endpoints (1):',
        '  ✗ platform_logos: HTTP 500',
        '',
        'Warnings (1):',
        '  ⚠ bad entry',
        '',
      ].join('\n'),
    );
  });
});
