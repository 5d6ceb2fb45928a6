import { Module } from '@nestjs/common';
import { CatalogueModule } from '../catalogue/catalogue.module';
import { LabelsModule } from '../labels/labels.module';
import { ReferenceDataModule } from '../reference-data/reference-data.module';
import { ScraperModule } from '../scraper/scraper.module';
import { PipelineRunner } from './pipeline.runner';

@Module({
  imports: [ReferenceDataModule, ScraperModule, CatalogueModule, LabelsModule],
  providers: [PipelineRunner],
  exports: [PipelineRunner],
})
export class PipelineModule {}
