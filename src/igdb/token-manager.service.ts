import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import * as path from 'path';
import { EnvironmentVariables } from '../config/environment';
import {
  ConfigurationError,
  ErrorCodes,
  TransportError,
  errorMessage,
} from '../common/errors/pipeline.errors';
import { ErrorHandlerUtil } from '../common/utils/error-handler.util';
import { maskSensitive } from '../common/utils/mask.util';
import {
  pathExists,
  readJsonFile,
  writeJsonFile,
} from '../common/utils/json-file.util';
import { IGDB_FILES, TWITCH_OAUTH } from './config/igdb.config';
import { ApiCredentials, isJsonObject } from './igdb.types';

const CREDENTIAL_KEYS = ['client_id', 'client_secret'] as const;

/**
 * Twitch client-credentials token lifecycle for IGDB.
 *
 * Credentials live in `<IGDB_CONFIG_DIR>/api_credentials.json`; the last
 * issued token is cached in `token.json` and checked against the validation
 * endpoint once per process before it is trusted.
 */
@Injectable()
export class TokenManagerService {
  private readonly logger = new Logger(TokenManagerService.name);
  private readonly configDir: string;
  private credentials: ApiCredentials | null = null;
  private token: string | null = null;

  constructor(
    private readonly httpService: HttpService,
    config: ConfigService<EnvironmentVariables, true>,
  ) {
    this.configDir = config.get('IGDB_CONFIG_DIR', { infer: true });
  }

  get credentialsPath(): string {
    return path.join(this.configDir, IGDB_FILES.credentials);
  }

  get tokenPath(): string {
    return path.join(this.configDir, IGDB_FILES.token);
  }

  async getHeaders(): Promise<Record<string, string>> {
    const credentials = await this.loadCredentials();
    const token = await this.initialiseToken();
    return {
      'Client-ID': credentials.client_id,
      Authorization: `Bearer ${token}`,
    };
  }

  async initialiseToken(): Promise<string> {
    if (this.token) return this.token;

    const stored = await this.readStoredToken();
    if (stored && (await this.isTokenValid(stored))) {
      this.token = stored;
      return stored;
    }
    if (stored) {
      this.logger.warn('⚠️ Cached token rejected by Twitch, requesting a new one');
    }

    const fresh = await this.requestNewToken();
    await writeJsonFile(this.tokenPath, { token: fresh }, 4);
    this.logger.log(`🔑 New access token stored in ${this.tokenPath}`);
    this.token = fresh;
    return fresh;
  }

  /**
   * Reads and checks the credentials file. A missing file is replaced by an
   * empty template and the run stops until the operator fills it in.
   */
  async loadCredentials(): Promise<ApiCredentials> {
    if (this.credentials) return this.credentials;

    if (!(await pathExists(this.credentialsPath))) {
      await writeJsonFile(
        this.credentialsPath,
        { client_id: '', client_secret: '' },
        4,
      );
      throw new ConfigurationError(
        `${IGDB_FILES.credentials} was not found at ${this.credentialsPath}. ` +
          'An empty template has been created. Please fill in required values.',
        ErrorCodes.CREDENTIALS_MISSING,
      );
    }

    let raw: unknown;
    try {
      raw = await readJsonFile(this.credentialsPath);
    } catch (error) {
      throw new ConfigurationError(
        `Unable to read ${this.credentialsPath}: ${errorMessage(error)}`,
      );
    }
    if (!isJsonObject(raw)) {
      throw new ConfigurationError(
        `${IGDB_FILES.credentials} must contain a JSON object`,
      );
    }

    for (const key of CREDENTIAL_KEYS) {
      const value = raw[key];
      if (typeof value !== 'string' || value.trim().length === 0) {
        throw new ConfigurationError(
          `${IGDB_FILES.credentials} is missing required value for '${key}'. ` +
            `Please add this value to ${this.credentialsPath}`,
          ErrorCodes.CREDENTIALS_MISSING,
        );
      }
    }

    this.credentials = {
      client_id: String(raw.client_id).trim(),
      client_secret: String(raw.client_secret).trim(),
    };
    this.logger.debug(
      `Credentials loaded: ${JSON.stringify(maskSensitive(this.credentials))}`,
    );
    return this.credentials;
  }

  private async readStoredToken(): Promise<string | null> {
    if (!(await pathExists(this.tokenPath))) return null;

    try {
      const raw = await readJsonFile(this.tokenPath);
      if (isJsonObject(raw) && typeof raw.token === 'string' && raw.token) {
        return raw.token;
      }
      this.logger.warn(`⚠️ ${this.tokenPath} has no token value, ignoring it`);
    } catch (error) {
      this.logger.warn(
        `⚠️ ${this.tokenPath} is unreadable, ignoring it: ${errorMessage(error)}`,
      );
    }
    return null;
  }

  private async isTokenValid(token: string): Promise<boolean> {
    const response = await ErrorHandlerUtil.executeApiCall(
      () =>
        firstValueFrom(
          this.httpService.get<unknown>(TWITCH_OAUTH.validateUrl, {
            headers: { Authorization: `OAuth ${token}` },
            validateStatus: (status) => status === 200 || status === 401,
          }),
        ),
      this.logger,
      'Twitch OAuth',
      TWITCH_OAUTH.validateUrl,
    );
    return response.status === 200;
  }

  private async requestNewToken(): Promise<string> {
    const { client_id, client_secret } = await this.loadCredentials();
    const form = new URLSearchParams({
      client_id,
      client_secret,
      grant_type: 'client_credentials',
    });

    const response = await ErrorHandlerUtil.executeApiCall(
      () =>
        firstValueFrom(
          this.httpService.post<unknown>(TWITCH_OAUTH.tokenUrl, form.toString(), {
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          }),
        ),
      this.logger,
      'Twitch OAuth',
      TWITCH_OAUTH.tokenUrl,
    );

    const body = response.data;
    if (!isJsonObject(body) || typeof body.access_token !== 'string') {
      throw new TransportError(
        'Twitch token response did not contain an access_token',
        response.status,
        TWITCH_OAUTH.tokenUrl,
        ErrorCodes.UNEXPECTED_RESPONSE,
      );
    }
    return body.access_token;
  }
}
