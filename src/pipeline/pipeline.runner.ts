import { Injectable, Logger } from '@nestjs/common';
import { CatalogueService } from '../catalogue/catalogue.service';
import { LabelGeneratorService } from '../labels/label-generator.service';
import { ReferenceDataCollector } from '../reference-data/reference-data.collector';
import { IgdbScraperService } from '../scraper/igdb-scraper.service';
import { PipelineCommand } from './cli-args.util';

@Injectable()
export class PipelineRunner {
  private readonly logger = new Logger(PipelineRunner.name);

  constructor(
    private readonly referenceCollector: ReferenceDataCollector,
    private readonly scraper: IgdbScraperService,
    private readonly catalogue: CatalogueService,
    private readonly labels: LabelGeneratorService,
  ) {}

  async run(command: PipelineCommand): Promise<void> {
    const startedAt = Date.now();
    this.logger.log(`🚀 Running '${command}'`);

    switch (command) {
      case 'collect-reference':
        await this.referenceCollector.collectAll();
        break;
      case 'scrape':
        await this.scraper.run();
        break;
      case 'catalogue':
        await this.catalogue.generate();
        break;
      case 'labels':
        await this.labels.generateFromCatalogue();
        break;
      case 'all':
        await this.scraper.run();
        await this.catalogue.generate();
        await this.labels.generateFromCatalogue();
        break;
    }

    this.logger.log(`✅ '${command}' finished in ${Date.now() - startedAt}ms`);
  }
}
