import { Module } from '@nestjs/common';
import { IgdbModule } from '../igdb/igdb.module';
import { EndpointConfigService } from './endpoint-config.service';
import { ReferenceDataCollector } from './reference-data.collector';

@Module({
  imports: [IgdbModule],
  providers: [EndpointConfigService, ReferenceDataCollector],
  exports: [EndpointConfigService, ReferenceDataCollector],
})
export class ReferenceDataModule {}
