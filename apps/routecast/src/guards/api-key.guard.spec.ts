import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ApiKeyGuard } from './api-key.guard';

function contextWithHeaders(headers: Record<string, string>) {
  return new ExecutionContextHost([{ headers }, {}]);
}

describe('ApiKeyGuard', () => {
  it('lets everything through without a configured key', () => {
    const guard = new ApiKeyGuard(new ConfigService({}));

    expect(guard.canActivate(contextWithHeaders({}))).toBe(true);
  });

  it('accepts the configured key', () => {
    const guard = new ApiKeyGuard(new ConfigService({ API_SECRET_KEY: 'test-secret' }));

    expect(guard.canActivate(contextWithHeaders({ 'x-api-key': 'test-secret' }))).toBe(true);
  });

  it('rejects a wrong or missing key', () => {
    const guard = new ApiKeyGuard(new ConfigService({ API_SECRET_KEY: 'test-secret' }));

    expect(() => guard.canActivate(contextWithHeaders({ 'x-api-key': 'test-secreT' }))).toThrow(UnauthorizedException);
    expect(() => guard.canActivate(contextWithHeaders({}))).toThrow(UnauthorizedException);
  });
});
