import { formatLongDate, toIsoDate } from '../common/collector/date.util';
import { JsonObject, JsonValue, isJsonObject } from '../igdb/igdb.types';
import { sortVersionsChronologically } from '../labels/platform-logo.selector';

export interface DetailRow {
  label: string;
  value: string;
}

export interface VersionSection {
  name: string;
  /** `29th September 1995 - Europe` */
  releases: string[];
  summary: string | null;
  logoFile: string | null;
}

function objects(value: JsonValue | undefined): JsonObject[] {
  return Array.isArray(value) ? value.filter(isJsonObject) : [];
}

function text(value: JsonValue | undefined): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

function names(value: JsonValue | undefined): string[] {
  return objects(value)
    .map((item) => text(item.name))
    .filter((name): name is string => name !== null);
}

function displayDate(value: JsonValue | undefined): string | null {
  const date = typeof value === 'string' || typeof value === 'number' ? toIsoDate(value) : null;
  return date === null ? null : formatLongDate(date);
}

/** Unescapes stored summaries and collapses whitespace, keeping line breaks. */
export function cleanText(value: string): string {
  return value
    .replace(/\\n/g, '\n')
    .replace(/\\t/g, ' ')
    .replace(/\\r|\r/g, '')
    .replace(/\\(["'\\])/g, '$1')
    .replace(/[^\S\n]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .trim();
}

/** `north_america` becomes `North America`. */
export function regionDisplayName(region: string): string {
  return region
    .replace(/_/g, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

export function platformInfoRows(platform: JsonObject): DetailRow[] {
  const platformType = isJsonObject(platform.platform_type)
    ? text(platform.platform_type.name)
    : null;
  const candidates: Array<[string, string | null]> = [
    ['Abbreviation', text(platform.abbreviation)],
    ['Alternative Name', text(platform.alternative_name)],
    ['Type', platformType],
    ['IGDB URL', text(platform.url)],
  ];
  return candidates.flatMap(([label, value]) => (value === null ? [] : [{ label, value }]));
}

/** Platform versions, earliest release first, ready for display. */
export function versionSections(platform: JsonObject): VersionSection[] {
  return sortVersionsChronologically(objects(platform.versions)).map((version) => {
    const logo = version.platform_logo;
    const summary = text(version.summary);
    return {
      name: text(version.name) ?? 'Unknown version',
      releases: objects(version.platform_version_release_dates).map((release) => {
        const region = isJsonObject(release.release_region)
          ? text(release.release_region.region)
          : null;
        return `${displayDate(release.date) ?? 'Unknown date'} - ${regionDisplayName(region ?? 'unknown region')}`;
      }),
      summary: summary === null ? null : cleanText(summary),
      logoFile: isJsonObject(logo) ? text(logo.local_file_path) : null,
    };
  });
}

/** Detail lines printed beside a game's cover, in display order. */
export function gameDetailRows(game: JsonObject): DetailRow[] {
  const rows: DetailRow[] = [];
  const add = (label: string, value: string | null) => {
    if (value) rows.push({ label, value });
  };

  add('Release Date', displayDate(game.first_release_date));
  add('Genres', names(game.genres).join(', '));

  const developers: string[] = [];
  const publishers: string[] = [];
  for (const involved of objects(game.involved_companies)) {
    const company = isJsonObject(involved.company) ? text(involved.company.name) : null;
    if (!company) continue;
    if (involved.developer === true) developers.push(company);
    if (involved.publisher === true) publishers.push(company);
  }
  add('Developer', developers.join(', '));
  add('Publisher', publishers.join(', '));
  add('Game Modes', names(game.game_modes).join(', '));
  add('Themes', names(game.themes).join(', '));

  if (typeof game.rating === 'number' && game.rating > 0) {
    const rating = Math.round(game.rating * 10) / 10;
    const votes = typeof game.rating_count === 'number' ? game.rating_count : 0;
    add('Rating', votes > 0 ? `${rating}/100 (${votes} votes)` : `${rating}/100`);
  }

  const summary = text(game.summary);
  add('Description', summary === null ? null : cleanText(summary));
  return rows;
}
