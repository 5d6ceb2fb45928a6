import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnvironment } from './config/environment';
import { PipelineModule } from './pipeline/pipeline.module';

@Module({})
export class AppModule {
  /** `overrides` take precedence over `.env` and the process environment. */
  static forRoot(overrides: Record<string, string> = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          validate: (config) => validateEnvironment({ ...config, ...overrides }),
        }),
        PipelineModule,
      ],
    };
  }
}
