import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import * as jwt from 'jsonwebtoken';
import { AuthGuard } from './auth.guard';

const SECRET = 'test-secret';

const claims = {
  userId: 'u:1',
  sessionId: 'session-1',
  name: 'Chef',
  role: 'manager',
};

describe('AuthGuard', () => {
  let guard: AuthGuard;

  const contextFor = (authorization?: string) => {
    const request: { headers: Record<string, string>; user?: unknown } = {
      headers: authorization ? { authorization } : {},
    };
    return { request, context: new ExecutionContextHost([request]) };
  };

  const keyOf = (run: () => unknown): unknown => {
    try {
      run();
    } catch (error) {
      if (!(error instanceof UnauthorizedException)) throw error;
      return error.getResponse();
    }
    throw new Error('expected the guard to reject');
  };

  beforeEach(() => {
    guard = new AuthGuard(new ConfigService({ JWT_SECRET: SECRET }));
  });

  it('should refuse to start without a secret', () => {
    expect(() => new AuthGuard(new ConfigService({}))).toThrow(/JWT_SECRET/);
  });

  it('should attach the session claims to the request', () => {
    const { request, context } = contextFor(`Bearer ${jwt.sign(claims, SECRET)}`);

    expect(guard.canActivate(context)).toBe(true);
    expect(request.user).toMatchObject(claims);
  });

  it('should reject a request without a bearer token', () => {
    expect(keyOf(() => guard.canActivate(contextFor().context))).toEqual({
      key: 'auth.token_not_found',
    });
    expect(
      keyOf(() => guard.canActivate(contextFor('Basic abc').context)),
    ).toEqual({ key: 'auth.token_not_found' });
  });

  it('should reject a token signed with another secret', () => {
    const token = jwt.sign(claims, 'other-secret');
    expect(keyOf(() => guard.canActivate(contextFor(`Bearer ${token}`).context))).toEqual({
      key: 'auth.invalid_token',
    });
  });

  it('should reject an expired token', () => {
    const token = jwt.sign(
      { ...claims, exp: Math.floor(Date.now() / 1000) - 60 },
      SECRET,
    );
    expect(keyOf(() => guard.canActivate(contextFor(`Bearer ${token}`).context))).toEqual({
      key: 'auth.token_expired',
    });
  });

  it('should reject a token without a session', () => {
    const token = jwt.sign({ userId: 'u:1', name: 'Chef', role: 'manager' }, SECRET);
    expect(keyOf(() => guard.canActivate(contextFor(`Bearer ${token}`).context))).toEqual({
      key: 'auth.invalid_token_payload',
    });
  });

  it('should reject unknown roles and permissions', () => {
    const badRole = jwt.sign({ ...claims, role: 'admin' }, SECRET);
    const badPermission = jwt.sign({ ...claims, permissions: ['stock.delete'] }, SECRET);

    expect(keyOf(() => guard.canActivate(contextFor(`Bearer ${badRole}`).context))).toEqual({
      key: 'auth.invalid_token_payload',
    });
    expect(
      keyOf(() => guard.canActivate(contextFor(`Bearer ${badPermission}`).context)),
    ).toEqual({ key: 'auth.invalid_token_payload' });
  });
});
