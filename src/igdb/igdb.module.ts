import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/environment';
import { IgdbApiService } from './igdb-api.service';
import { TokenManagerService } from './token-manager.service';

/**
 * IGDB access: Twitch token lifecycle plus the Apicalypse client.
 * Also exports HttpModule so image downloads share the same timeout.
 */
@Module({
  imports: [
    HttpModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvironmentVariables, true>) => ({
        timeout: config.get('IGDB_API_TIMEOUT_MS', { infer: true }),
      }),
    }),
  ],
  providers: [TokenManagerService, IgdbApiService],
  exports: [TokenManagerService, IgdbApiService, HttpModule],
})
export class IgdbModule {}
