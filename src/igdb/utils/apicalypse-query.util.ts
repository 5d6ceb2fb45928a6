// Helpers for composing Apicalypse request bodies
// e.g. "fields name,versions.*; where platforms = (6); limit 100; offset 200;"

const LIMIT_STATEMENT = /\s*\blimit\s+\d+\s*;/gi;
const OFFSET_STATEMENT = /\s*\boffset\s+\d+\s*;/gi;

function terminate(body: string): string {
  const trimmed = body.trim();
  if (!trimmed) return '';
  return trimmed.endsWith(';') ? trimmed : `${trimmed};`;
}

function join(body: string, statement: string): string {
  const base = terminate(body);
  return base ? `${base} ${statement}` : statement;
}

export function appendLimit(body: string, limit: number): string {
  return join(body, `limit ${limit};`);
}

/** Replaces any limit/offset statements with the given page window. */
export function withPage(body: string, limit: number, offset: number): string {
  const stripped = body.replace(LIMIT_STATEMENT, '').replace(OFFSET_STATEMENT, '');
  return join(stripped, `limit ${limit}; offset ${offset};`);
}

/**
 * Adds `condition` to the body's `where` clause with `&`, or starts a
 * new clause when there is none.
 */
function withCondition(body: string, condition: string): string {
  if (/\bwhere\s/i.test(body)) {
    return terminate(body.replace(/\bwhere\s+/i, `where ${condition} & `));
  }
  return join(body, `where ${condition};`);
}

export function withIdFilter(body: string, ids: ReadonlyArray<number | string>): string {
  return withCondition(body, `id = (${ids.join(',')})`);
}

/** Restricts a query to one platform. */
export function withPlatformFilter(body: string, platformId: number | string): string {
  return withCondition(body, `platforms = (${platformId})`);
}
