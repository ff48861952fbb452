import {
  ExecutionContext,
  ForbiddenException,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AdminKeyGuard } from './admin-key.guard';

describe('AdminKeyGuard', () => {
  const contextFor = (headers: Record<string, string>) =>
    ({
      switchToHttp: () => ({
        getRequest: () => ({ headers, query: {} }),
      }),
    }) as unknown as ExecutionContext;

  const guardWithKey = (key?: string) =>
    new AdminKeyGuard({
      get: jest.fn(() => key),
    } as unknown as ConfigService);

  it('should close the admin API when no key is configured', () => {
    expect(() => guardWithKey().canActivate(contextFor({}))).toThrow(
      ForbiddenException,
    );
  });

  it('should accept the key as a Bearer token', () => {
    expect(
      guardWithKey('test-admin').canActivate(
        contextFor({ authorization: 'Bearer test-admin' }),
      ),
    ).toBe(true);
  });

  it('should accept the x-admin-key header', () => {
    expect(
      guardWithKey('test-admin').canActivate(
        contextFor({ 'x-admin-key': 'test-admin' }),
      ),
    ).toBe(true);
  });

  it('should reject a missing key', () => {
    expect(() => guardWithKey('test-admin').canActivate(contextFor({}))).toThrow(
      'Missing admin key',
    );
  });

  it('should reject a wrong key', () => {
    expect(() =>
      guardWithKey('test-admin').canActivate(
        contextFor({ 'x-admin-key': 'other' }),
      ),
    ).toThrow(UnauthorizedException);
  });
});
