import { createHash, timingSafeEqual } from 'node:crypto';
import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { APP_CONFIG, logger } from '@mailq/shared';
import type { AppConfig } from '@mailq/shared';
import { headerValue } from '../http.types';
import type { GuardedRequest } from '../http.types';

/**
 * Requires X-API-Key to match API_KEY. Open when no key is configured.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.config.api.apiKey;
    if (expected === undefined) {
      return true;
    }

    const request = context.switchToHttp().getRequest<GuardedRequest>();
    const provided = headerValue(request, 'x-api-key');
    if (provided === undefined || provided === '') {
      throw new UnauthorizedException('Missing API key');
    }
    if (!safeEqual(provided, expected)) {
      logger.warn({ service: 'api' }, 'invalid api key');
      throw new UnauthorizedException('Invalid API key');
    }
    return true;
  }
}

// timingSafeEqual needs equal lengths; compare digests.
function safeEqual(a: string, b: string): boolean {
  const digest = (value: string) => createHash('sha256').update(value).digest();
  return timingSafeEqual(digest(a), digest(b));
}
