import { Logger, UnauthorizedException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { createTestConfig, TEST_API_KEY } from '../../test/utils/test-config';
import { ApiKeyGuard } from './api-key.guard';

function contextWithHeaders(headers: Record<string, string>) {
  return new ExecutionContextHost([{ headers, method: 'POST', url: '/api/control/stop/bot_alpha' }, {}]);
}

describe('ApiKeyGuard', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('lets every request through when enforcement is off', () => {
    const guard = new ApiKeyGuard(createTestConfig({ auth: { apiKey: TEST_API_KEY, enforce: false } }));

    expect(guard.canActivate(contextWithHeaders({}))).toBe(true);
  });

  describe('when enforced', () => {
    const guard = new ApiKeyGuard(createTestConfig({ auth: { apiKey: TEST_API_KEY, enforce: true } }));

    it('accepts the key in x-api-key', () => {
      expect(guard.canActivate(contextWithHeaders({ 'x-api-key': TEST_API_KEY }))).toBe(true);
    });

    it('accepts the key as a bearer token', () => {
      expect(guard.canActivate(contextWithHeaders({ authorization: `Bearer ${TEST_API_KEY}` }))).toBe(true);
    });

    it('rejects a missing key', () => {
      expect(() => guard.canActivate(contextWithHeaders({}))).toThrow(UnauthorizedException);
    });

    it('rejects a wrong key of the same length', () => {
      expect(() => guard.canActivate(contextWithHeaders({ 'x-api-key': 'test-secreT' }))).toThrow(
        'Missing or invalid API key',
      );
    });

    it('rejects a non-bearer authorization header', () => {
      expect(() => guard.canActivate(contextWithHeaders({ authorization: `Basic ${TEST_API_KEY}` }))).toThrow(
        UnauthorizedException,
      );
    });
  });

  it('rejects everything when enforced without a configured key', () => {
    const guard = new ApiKeyGuard(createTestConfig({ auth: { apiKey: undefined, enforce: true } }));

    expect(() => guard.canActivate(contextWithHeaders({ 'x-api-key': TEST_API_KEY }))).toThrow(UnauthorizedException);
  });
});
