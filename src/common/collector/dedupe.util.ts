export type RecordId = string | number;

export type IdentifiedRecord = { readonly [key: string]: unknown };

function recordId(record: IdentifiedRecord): RecordId | null {
  const id = record.id;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

/**
 * Drops records whose `id` was already seen, keeping first-seen order.
 * Records without an id are always kept; a missing id is not a collision.
 */
export function dedupeById<T extends IdentifiedRecord>(records: readonly T[]): T[] {
  const seen = new Set<RecordId>();
  const deduplicated: T[] = [];

  for (const record of records) {
    const id = recordId(record);
    if (id === null) {
      deduplicated.push(record);
      continue;
    }
    if (seen.has(id)) continue;
    seen.add(id);
    deduplicated.push(record);
  }

  return deduplicated;
}
