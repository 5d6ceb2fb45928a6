import * as countries from 'i18n-iso-countries';
import { unixToIsoDate } from '../../common/collector/date.util';
import { IgdbRecord, JsonValue, isJsonObject } from '../../igdb/igdb.types';

// enum-valued fields whose names happen to contain "date"
const NON_TIMESTAMP_FIELDS = new Set(['date_format']);

export function isDateField(key: string): boolean {
  const lowered = key.toLowerCase();
  return lowered.includes('date') && !NON_TIMESTAMP_FIELDS.has(lowered);
}

/** ISO 3166-1 numeric to alpha-3; unknown codes come back unchanged. */
export function toAlpha3(numeric: number): string | number {
  if (!Number.isInteger(numeric) || numeric < 0) return numeric;
  return countries.numericToAlpha3(String(numeric).padStart(3, '0')) ?? numeric;
}

/**
 * Returns a copy of the value with unix timestamps in date fields turned
 * into `YYYY-MM-DD` (UTC) and numeric `country` codes into alpha-3.
 */
export function normalizeRecordFields(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(normalizeRecordFields);
  if (!isJsonObject(value)) return value;

  const normalized: IgdbRecord = {};
  for (const [key, field] of Object.entries(value)) {
    if (isDateField(key) && typeof field === 'number' && field > 0) {
      normalized[key] = unixToIsoDate(field) ?? field;
    } else if (key === 'country' && typeof field === 'number') {
      normalized[key] = toAlpha3(field);
    } else {
      normalized[key] = normalizeRecordFields(field);
    }
  }
  return normalized;
}

export function normalizeRecord(record: IgdbRecord): IgdbRecord {
  const normalized = normalizeRecordFields(record);
  return isJsonObject(normalized) ? normalized : record;
}
