#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { PipelineError } from './common/errors/pipeline.errors';
import { USAGE, parseCliArgs } from './pipeline/cli-args.util';
import { PipelineRunner } from './pipeline/pipeline.runner';

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv);
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const app = await NestFactory.createApplicationContext(
    AppModule.forRoot(args.overrides),
    { logger: ['log', 'error', 'warn'] },
  );
  try {
    await app.get(PipelineRunner).run(args.command);
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  const logger = new Logger('Main');
  if (error instanceof PipelineError) {
    logger.error(`❌ [${error.code}] ${error.message}`);
  } else {
    logger.error(`❌ ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
  }
  process.exitCode = 1;
});
