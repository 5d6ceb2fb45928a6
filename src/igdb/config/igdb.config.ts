// https://dev.twitch.tv/docs/authentication/getting-tokens-oauth/#client-credentials-grant-flow
export const TWITCH_OAUTH = {
  tokenUrl: 'https://id.twitch.tv/oauth2/token',
  validateUrl: 'https://id.twitch.tv/oauth2/validate',
} as const;

export const IGDB_FILES = {
  credentials: 'api_credentials.json',
  token: 'token.json',
} as const;

export const IGDB_LIMITS = {
  /** Apicalypse rejects any `limit` above this */
  maxPageSize: 500,
  defaultPageSize: 100,
  defaultTimeoutMs: 60_000,
} as const;
