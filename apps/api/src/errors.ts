import {
  BadRequestException,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { errorMessage, isKnownError, logger } from '@mailq/shared';

/**
 * Maps store failures onto HTTP: rejected input is 400, a missing job 404,
 * an unreachable store 503. Anything else is rethrown untouched.
 */
export function toHttpException(error: unknown): unknown {
  if (!isKnownError(error)) {
    return error;
  }
  switch (error.kind) {
    case 'store':
      if (error.reason === 'constraint') {
        return new BadRequestException(error.message);
      }
      logger.error(
        { service: 'api', reason: error.reason, error: errorMessage(error) },
        'job store unavailable',
      );
      return new ServiceUnavailableException('Job store unavailable');
    case 'job_not_found':
      return new NotFoundException(error.message);
    default:
      return error;
  }
}
