import { RecordId } from '../common/collector/dedupe.util';
import { RecordDate, earliestOf, toIsoDate } from '../common/collector/date.util';

export interface OwnershipGroup {
  id: number;
  name: string;
}

export interface OwnershipGame {
  id?: RecordId | null;
  name?: string | null;
  first_release_date?: RecordDate;
  release_dates?: ReadonlyArray<{ date?: RecordDate }> | null;
}

export interface OwnershipInput<G extends OwnershipGame = OwnershipGame> {
  group: OwnershipGroup;
  games: readonly G[];
}

export interface OwnershipEntry {
  readonly earliestDate: string | null;
  readonly groupId: number;
  readonly groupName: string;
  readonly gameName: string | null;
}

/**
 * `first_release_date` when present, otherwise the smallest
 * `release_dates[].date`, otherwise null.
 */
export function earliestDate(game: OwnershipGame): string | null {
  const first = toIsoDate(game.first_release_date);
  if (first !== null) return first;
  return earliestOf((game.release_dates ?? []).map((release) => release.date));
}

function shouldReplace(existing: OwnershipEntry, candidate: OwnershipEntry): boolean {
  const next = candidate.earliestDate;
  const current = existing.earliestDate;
  if (next === null) return false;
  if (current === null) return true;
  if (next < current) return true;
  return next === current && candidate.groupId < existing.groupId;
}

/** Read-only snapshot of which group owns each game. */
export class OwnershipMap {
  private constructor(private readonly entries: ReadonlyMap<RecordId, OwnershipEntry>) {}

  static fromEntries(entries: Map<RecordId, OwnershipEntry>): OwnershipMap {
    return new OwnershipMap(new Map(entries));
  }

  get size(): number {
    return this.entries.size;
  }

  get(gameId: RecordId): OwnershipEntry | undefined {
    return this.entries.get(gameId);
  }

  /** Untracked games count as first releases everywhere. */
  isFirstRelease(gameId: RecordId | null | undefined, groupId: number): boolean {
    if (gameId === null || gameId === undefined) return true;
    const entry = this.entries.get(gameId);
    return entry === undefined || entry.groupId === groupId;
  }
}

/**
 * Assigns every game id to the group with its earliest release date.
 * Equal dates go to the lower group id, so the result does not depend on
 * group order. Games without an id are ignored.
 */
export function buildOwnershipMap<G extends OwnershipGame>(
  groups: Iterable<OwnershipInput<G>>,
): OwnershipMap {
  const entries = new Map<RecordId, OwnershipEntry>();

  for (const { group, games } of groups) {
    for (const game of games) {
      if (!game.id) continue;

      const candidate: OwnershipEntry = Object.freeze({
        earliestDate: earliestDate(game),
        groupId: group.id,
        groupName: group.name,
        gameName: game.name ?? null,
      });
      const existing = entries.get(game.id);
      if (!existing || shouldReplace(existing, candidate)) {
        entries.set(game.id, candidate);
      }
    }
  }

  return OwnershipMap.fromEntries(entries);
}
