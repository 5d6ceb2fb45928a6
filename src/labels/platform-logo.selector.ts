import { promises as fs } from 'fs';
import * as path from 'path';
import { compareDatesMissingLast, toIsoDate } from '../common/collector/date.util';
import { pathExists } from '../common/utils/json-file.util';
import { JsonObject, JsonValue, isJsonObject } from '../igdb/igdb.types';

export interface Candidate<T> {
  payload: T;
  date: string | null;
  region: string;
  versionName: string;
}

export interface CandidateSet<T> {
  /** Options with at least one known release */
  candidates: Candidate<T>[];
  /** Options without any release, in input order */
  fallback: Candidate<T>[];
}

export const REGION_PRIORITY = ['europe', 'japan'] as const;

function earliest<T>(candidates: readonly Candidate<T>[]): Candidate<T> | undefined {
  return [...candidates].sort((a, b) => compareDatesMissingLast(a.date, b.date))[0];
}

/**
 * Earliest Europe candidate, else earliest Japan candidate, else earliest
 * of any region, else the first fallback, else null. Undated candidates
 * sort after dated ones; ties keep input order.
 */
export function selectBest<T>(
  candidates: readonly Candidate<T>[],
  fallback: readonly Candidate<T>[] = [],
): T | null {
  for (const region of REGION_PRIORITY) {
    const pick = earliest(
      candidates.filter((candidate) => candidate.region.toLowerCase() === region),
    );
    if (pick) return pick.payload;
  }

  const any = earliest(candidates);
  if (any) return any.payload;

  return fallback[0]?.payload ?? null;
}

function objects(value: JsonValue | undefined): JsonObject[] {
  return Array.isArray(value) ? value.filter(isJsonObject) : [];
}

function releaseDate(release: JsonObject): string | null {
  const date = release.date;
  return typeof date === 'string' || typeof date === 'number' ? toIsoDate(date) : null;
}

function releaseRegion(release: JsonObject): string {
  const region = release.release_region;
  if (isJsonObject(region) && typeof region.region === 'string') {
    return region.region.toLowerCase();
  }
  return '';
}

function versionName(version: JsonObject): string {
  return typeof version.name === 'string' ? version.name : 'unknown';
}

/**
 * One candidate per (version logo, version release). Versions without a
 * logo are ignored; versions without releases become fallbacks.
 */
export function flattenLogoCandidates(platform: JsonObject): CandidateSet<JsonObject> {
  const candidates: Candidate<JsonObject>[] = [];
  const fallback: Candidate<JsonObject>[] = [];

  for (const version of objects(platform.versions)) {
    const logo = version.platform_logo;
    if (!isJsonObject(logo) || typeof logo.image_id !== 'string' || !logo.image_id) {
      continue;
    }

    const releases = objects(version.platform_version_release_dates);
    if (releases.length === 0) {
      fallback.push({ payload: logo, date: null, region: 'unknown', versionName: versionName(version) });
      continue;
    }
    for (const release of releases) {
      candidates.push({
        payload: logo,
        date: releaseDate(release),
        region: releaseRegion(release),
        versionName: versionName(version),
      });
    }
  }

  return { candidates, fallback };
}

export function selectBestPlatformLogo(platform: JsonObject): JsonObject | null {
  const { candidates, fallback } = flattenLogoCandidates(platform);
  return selectBest(candidates, fallback);
}

function versionEarliestDate(version: JsonObject): string | null {
  let earliestDate: string | null = null;
  for (const release of objects(version.platform_version_release_dates)) {
    const date = releaseDate(release);
    if (compareDatesMissingLast(date, earliestDate) < 0) earliestDate = date;
  }
  return earliestDate;
}

export function sortVersionsChronologically(versions: readonly JsonObject[]): JsonObject[] {
  return versions
    .map((version) => ({ version, date: versionEarliestDate(version) }))
    .sort((a, b) => compareDatesMissingLast(a.date, b.date))
    .map(({ version }) => version);
}

/**
 * File of the selected logo inside `platformFolder`, else the first file
 * whose name mentions `platform_logo`, else null.
 */
export async function findPlatformLogoPath(
  platform: JsonObject,
  platformFolder: string,
): Promise<string | null> {
  const logo = selectBestPlatformLogo(platform);
  const localPath = logo?.local_file_path;
  if (typeof localPath === 'string' && localPath) {
    const logoPath = path.join(platformFolder, localPath);
    if (await pathExists(logoPath)) return logoPath;
  }

  if (!(await pathExists(platformFolder))) return null;
  const entries = await fs.readdir(platformFolder, { withFileTypes: true });
  const match = entries
    .filter((entry) => entry.isFile() && entry.name.includes('platform_logo'))
    .map((entry) => entry.name)
    .sort()[0];
  return match ? path.join(platformFolder, match) : null;
}
