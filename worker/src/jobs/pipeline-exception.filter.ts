import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  JobNotFoundError,
  OutputNotFoundError,
  PipelineError,
  PipelineValidationError,
} from '@media-pipeline/shared';

/**
 * Maps domain errors raised by the jobs API to HTTP responses.
 * Anything else falls through to Nest's default 500 handling.
 */
@Catch(PipelineValidationError, JobNotFoundError, OutputNotFoundError)
export class PipelineExceptionFilter implements ExceptionFilter<PipelineError> {
  catch(exception: PipelineError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception instanceof PipelineValidationError) {
      response.status(HttpStatus.BAD_REQUEST).json({
        error: exception.message,
        code: exception.code,
        invalid_steps: exception.invalidSteps,
      });
      return;
    }

    response.status(HttpStatus.NOT_FOUND).json({
      error: exception.message,
      code: exception.code,
    });
  }
}
