import { IgdbRecord } from '../igdb/igdb.types';

export interface EndpointStats {
  endpoint_name: string;
  endpoint_url: string;
  batches_required: number;
  total_records: number;
  duplicates_removed: number;
  /** The endpoint returned fewer records than its count announced */
  exhausted_early: boolean;
  start_time: string;
  end_time: string;
}

export interface FailedEndpoint {
  endpoint: string;
  error: string;
}

export interface OverallStats {
  start_time: string;
  end_time: string;
  endpoints_processed: number;
  total_records_collected: number;
  successful_endpoints: string[];
  failed_endpoints: FailedEndpoint[];
  warnings: string[];
}

export interface EndpointResult {
  data: IgdbRecord[];
  stats: EndpointStats;
}

export interface ReferenceCollectionResult {
  results: Record<string, EndpointResult>;
  stats: OverallStats;
}
