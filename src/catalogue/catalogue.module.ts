import { Module } from '@nestjs/common';
import { CatalogueDataLoader } from './catalogue-data.loader';
import { CataloguePdfService } from './catalogue-pdf.service';
import { CatalogueService } from './catalogue.service';

@Module({
  providers: [CatalogueDataLoader, CataloguePdfService, CatalogueService],
  exports: [CatalogueDataLoader, CatalogueService],
})
export class CatalogueModule {}
