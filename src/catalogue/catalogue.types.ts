import { JsonObject } from '../igdb/igdb.types';
import { GameRecordDto, PlatformInfoDto } from './dto/catalogue-record.dto';

export interface LoadedGame {
  /** Game folder name inside its platform folder */
  folder: string;
  record: GameRecordDto;
  raw: JsonObject;
}

export interface LoadedPlatform {
  folder: string;
  info: PlatformInfoDto;
  raw: JsonObject;
  games: LoadedGame[];
}

export interface SelectedGame {
  game_id: number | null;
  game_name: string;
  rating: number;
  release_date: string | null;
  is_first_release: boolean;
  /** Relative to the detail directory */
  reference_json_path: string;
  game_folder_path: string;
  platform_folder: string;
}

export interface SelectionResult {
  platform_id: number;
  platform_name: string;
  platform_folder: string;
  total_eligible_games: number;
  selected_count: number;
  first_release_count: number;
  duplicate_count: number;
  games: SelectedGame[];
  selection_date: string;
}

export interface CatalogueMetadata {
  generated_at: string;
  total_platforms: number;
  games_per_platform: number;
  selection_criteria: string;
  total_games_selected: number;
  total_first_release_games: number;
  total_duplicate_games: number;
  first_release_percentage: number;
  duplicate_percentage: number;
}

export interface CatalogueDocument {
  metadata: CatalogueMetadata;
  /** Keyed by platform folder name */
  platforms: Record<string, SelectionResult>;
}
