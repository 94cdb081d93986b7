import { createHash } from 'node:crypto';
import {
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
} from '@nestjs/common';
import { logger } from '@mailq/shared';
import { headerValue } from '../http.types';
import type { GuardedRequest, HeaderSink } from '../http.types';
import { RATE_LIMITER, SlidingWindowLimiter } from './sliding-window.limiter';

/**
 * Admission control for the submission boundary. Rejections become HTTP 429
 * with a Retry-After header in whole seconds.
 */
@Injectable()
export class RateLimitGuard implements CanActivate {
  constructor(
    @Inject(RATE_LIMITER) private readonly limiter: SlidingWindowLimiter,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const http = context.switchToHttp();
    const clientKey = clientKeyOf(http.getRequest<GuardedRequest>());

    const decision = this.limiter.check(clientKey);
    if (decision.allowed) {
      return true;
    }

    const retryAfterSeconds = Math.max(
      1,
      Math.ceil(decision.retryAfterMs / 1000),
    );
    http
      .getResponse<HeaderSink>()
      .setHeader('Retry-After', String(retryAfterSeconds));

    logger.warn(
      {
        service: 'api',
        client: clientKey,
        window: decision.window,
        retry_after_seconds: retryAfterSeconds,
      },
      'rate limit exceeded',
    );

    throw new HttpException(
      {
        statusCode: HttpStatus.TOO_MANY_REQUESTS,
        error: 'RateLimited',
        message: `Too many requests in the last ${decision.window}, retry in ${retryAfterSeconds}s`,
        retry_after_seconds: retryAfterSeconds,
      },
      HttpStatus.TOO_MANY_REQUESTS,
    );
  }
}

/**
 * First X-Forwarded-For hop, else the socket address, hashed so raw
 * addresses never reach the limiter's state or the logs.
 */
export function clientKeyOf(request: GuardedRequest): string {
  const forwarded = headerValue(request, 'x-forwarded-for')?.split(',')[0].trim();
  const address =
    forwarded || request.ip || request.socket?.remoteAddress || 'unknown';
  return createHash('sha256').update(address).digest('hex').slice(0, 16);
}
