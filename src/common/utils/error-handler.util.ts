import { Logger } from '@nestjs/common';
import { isAxiosError } from 'axios';
import {
  EntityProcessingError,
  PipelineError,
  TransportError,
  errorMessage,
} from '../errors/pipeline.errors';
import { LoggerHelper } from './logger.helper';

/**
 * Standard wrappers for the two failure policies of the pipeline:
 * transport calls fail the current step, per-entity steps are skipped.
 */
export class ErrorHandlerUtil {
  /**
   * Runs an HTTP call and normalizes any failure into a TransportError.
   * Nothing is retried; the operator re-runs the pipeline.
   */
  static async executeApiCall<T>(
    apiCall: () => Promise<T>,
    logger: Logger,
    apiName: string,
    endpoint: string,
  ): Promise<T> {
    try {
      return await apiCall();
    } catch (error) {
      // configuration problems surfaced mid-call keep their own type
      if (error instanceof PipelineError && !(error instanceof TransportError)) {
        throw error;
      }
      const processed = this.toTransportError(error, apiName, endpoint);
      LoggerHelper.logError(logger, `${apiName} request`, processed, {
        endpoint,
        status: processed.status,
      });
      throw processed;
    }
  }

  /**
   * Runs one entity's processing step. A failure is logged as a warning and
   * yields null so the caller can move on to the next entity.
   */
  static async executeForEntity<T>(
    operation: () => Promise<T>,
    logger: Logger,
    entity: string,
  ): Promise<T | null> {
    try {
      return await operation();
    } catch (error) {
      const wrapped =
        error instanceof EntityProcessingError
          ? error
          : new EntityProcessingError(errorMessage(error), entity, error);
      LoggerHelper.logWarning(logger, 'Entity skipped', wrapped.message, {
        entity,
      });
      return null;
    }
  }

  static toTransportError(
    error: unknown,
    apiName: string,
    endpoint: string,
  ): TransportError {
    if (error instanceof TransportError) return error;
    if (isAxiosError(error)) {
      const status = error.response?.status ?? null;
      const reason = status
        ? `HTTP ${status}`
        : error.code ?? 'network failure';
      return new TransportError(
        `${apiName} request to ${endpoint} failed: ${reason} (${error.message})`,
        status,
        endpoint,
      );
    }
    return new TransportError(
      `${apiName} request to ${endpoint} failed: ${errorMessage(error)}`,
      null,
      endpoint,
    );
  }
}
