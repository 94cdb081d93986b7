import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { loadConfig } from '@mailq/shared';
import type { GuardedRequest } from '../http.types';
import { ApiKeyGuard } from './api-key.guard';

function contextFor(request: GuardedRequest) {
  return {
    switchToHttp: () => ({ getRequest: () => request }),
  } as unknown as ExecutionContext;
}

describe('ApiKeyGuard', () => {
  const guard = new ApiKeyGuard(loadConfig({ API_KEY: 'test-secret' }));

  it('should accept the configured key', () => {
    expect(
      guard.canActivate(contextFor({ headers: { 'x-api-key': 'test-secret' } })),
    ).toBe(true);
  });

  it('should reject a wrong key', () => {
    expect(() =>
      guard.canActivate(contextFor({ headers: { 'x-api-key': 'wrong-secret' } })),
    ).toThrow(new UnauthorizedException('Invalid API key'));
  });

  it('should reject a missing key', () => {
    expect(() => guard.canActivate(contextFor({ headers: {} }))).toThrow(
      UnauthorizedException,
    );
  });

  it('should let everything through when no key is configured', () => {
    const open = new ApiKeyGuard(loadConfig({}));

    expect(open.canActivate(contextFor({ headers: {} }))).toBe(true);
  });
});
