export interface QuotaCandidate {
  rating?: number | null;
  isPreferred: boolean;
}

export interface QuotaSelection<T> {
  selected: T[];
  fromPreferred: number;
  fromOther: number;
}

const byRatingDesc = (a: QuotaCandidate, b: QuotaCandidate): number =>
  (b.rating ?? 0) - (a.rating ?? 0);

/**
 * Highest-rated preferred items first, topped up with the highest-rated
 * others until `targetCount` is reached. Equal ratings keep pool order.
 */
export function selectQuota<T extends QuotaCandidate>(
  pool: readonly T[],
  targetCount: number,
): QuotaSelection<T> {
  const quota = Math.max(0, Math.floor(targetCount));
  const preferred = pool.filter((item) => item.isPreferred).sort(byRatingDesc);
  const other = pool.filter((item) => !item.isPreferred).sort(byRatingDesc);

  const fromPreferred = preferred.slice(0, quota);
  const fromOther = other.slice(0, quota - fromPreferred.length);

  return {
    selected: [...fromPreferred, ...fromOther],
    fromPreferred: fromPreferred.length,
    fromOther: fromOther.length,
  };
}
