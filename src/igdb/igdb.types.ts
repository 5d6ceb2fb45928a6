// Records arrive as Apicalypse JSON and are written back to disk almost
// untouched, so they are modelled as JSON trees rather than fixed shapes.
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type IgdbRecord = JsonObject;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface ApiCredentials {
  client_id: string;
  client_secret: string;
}

/** Image object as found anywhere in an IGDB record */
export interface IgdbImageRef extends JsonObject {
  image_id: string;
  width: number;
  height: number;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isImageRef(value: unknown): value is IgdbImageRef {
  return (
    isJsonObject(value) &&
    typeof value.image_id === 'string' &&
    typeof value.width === 'number' &&
    typeof value.height === 'number'
  );
}

export function toRecordArray(value: unknown): IgdbRecord[] {
  if (Array.isArray(value)) return value.filter(isJsonObject);
  if (isJsonObject(value)) return [value];
  return [];
}
