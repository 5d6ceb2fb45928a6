import { Logger } from '@nestjs/common';
import { PipelineError, errorMessage } from '../errors/pipeline.errors';

/** Uniform stage log lines: `<operation> started|complete|failed|warning ...` */
export class LoggerHelper {
  static logStart(logger: Logger, operation: string, context?: unknown): void {
    logger.log(`${operation} started${this.describe(context)}`);
  }

  static logComplete(logger: Logger, operation: string, stats?: unknown): void {
    logger.log(`${operation} complete${this.summarize(stats)}`);
  }

  static logError(
    logger: Logger,
    operation: string,
    error: unknown,
    context?: unknown,
  ): void {
    const code = error instanceof PipelineError ? ` [${error.code}]` : '';
    logger.error(
      `${operation} failed${code}: ${errorMessage(error)}${this.describe(context)}`,
    );
  }

  static logWarning(
    logger: Logger,
    operation: string,
    reason: string,
    context?: unknown,
  ): void {
    logger.warn(`${operation} warning: ${reason}${this.describe(context)}`);
  }

  // { processed: 3, failed: 1 } -> " - processed: 3, failed: 1"
  private static summarize(stats: unknown): string {
    if (stats === undefined) return '';
    if (typeof stats !== 'object' || stats === null) return ` - ${String(stats)}`;
    const pairs = Object.entries(stats).map(([key, value]) => `${key}: ${String(value)}`);
    return ` - ${pairs.join(', ')}`;
  }

  private static describe(context: unknown): string {
    if (context === undefined) return '';
    return ` (${typeof context === 'object' ? JSON.stringify(context) : String(context)})`;
  }
}
