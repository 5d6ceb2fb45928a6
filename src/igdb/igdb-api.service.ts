import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import {
  ErrorCodes,
  TransportError,
} from '../common/errors/pipeline.errors';
import { ErrorHandlerUtil } from '../common/utils/error-handler.util';
import { maskSensitive } from '../common/utils/mask.util';
import { TokenManagerService } from './token-manager.service';
import {
  HttpMethod,
  IgdbRecord,
  isJsonObject,
  toRecordArray,
} from './igdb.types';

@Injectable()
export class IgdbApiService {
  private readonly logger = new Logger(IgdbApiService.name);

  constructor(
    private readonly httpService: HttpService,
    private readonly tokenManager: TokenManagerService,
  ) {}

  /**
   * Sends an Apicalypse body and returns the records. A single object
   * response is wrapped; anything that is not a record becomes [].
   */
  async query(
    url: string,
    body: string,
    method: HttpMethod = 'POST',
  ): Promise<IgdbRecord[]> {
    const data = await this.send(url, body, method);
    return toRecordArray(data);
  }

  async count(url: string, body = ''): Promise<number> {
    const data = await this.send(url, body, 'POST');
    const payload = Array.isArray(data) ? data[0] : data;

    if (
      isJsonObject(payload) &&
      typeof payload.count === 'number' &&
      Number.isInteger(payload.count) &&
      payload.count >= 0
    ) {
      return payload.count;
    }

    throw new TransportError(
      `Unexpected count response from ${url}: ${JSON.stringify(data)}`,
      null,
      url,
      ErrorCodes.UNEXPECTED_RESPONSE,
    );
  }

  private async send(
    url: string,
    body: string,
    method: HttpMethod,
  ): Promise<unknown> {
    const headers = await this.tokenManager.getHeaders();
    this.logger.debug(
      `${method} ${url} <- ${body} ${JSON.stringify(maskSensitive(headers))}`,
    );

    const response = await ErrorHandlerUtil.executeApiCall(
      () =>
        firstValueFrom(
          this.httpService.request<unknown>({
            url,
            method,
            data: body,
            headers: { ...headers, 'Content-Type': 'text/plain' },
          }),
        ),
      this.logger,
      'IGDB',
      url,
    );
    return response.data;
  }
}
