import { Module } from '@nestjs/common';
import { IgdbModule } from '../igdb/igdb.module';
import { ReferenceDataModule } from '../reference-data/reference-data.module';
import { IgdbScraperService } from './igdb-scraper.service';
import { ImageCropperService } from './image-cropper.service';
import { ImageDownloaderService } from './image-downloader.service';

@Module({
  imports: [IgdbModule, ReferenceDataModule],
  providers: [ImageCropperService, ImageDownloaderService, IgdbScraperService],
  exports: [IgdbScraperService],
})
export class ScraperModule {}
