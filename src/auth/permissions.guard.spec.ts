import { ForbiddenException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { StockController } from '../stock/stock.controller';
import { Permission } from './permissions.enum';
import { PermissionsGuard } from './permissions.guard';
import type { UserPayload } from './auth.guard';

describe('PermissionsGuard', () => {
  const guard = new PermissionsGuard(new Reflector());

  const contextFor = (handler: Function, user?: UserPayload) =>
    new ExecutionContextHost([{ user }], StockController, handler);

  const player: UserPayload = {
    userId: 'u:2',
    sessionId: 'session-1',
    name: 'Line cook',
    role: 'player',
  };

  it('should let a player consume stock', () => {
    expect(guard.canActivate(contextFor(StockController.prototype.consume, player))).toBe(
      true,
    );
  });

  it('should stop a player from running the daily batch', () => {
    expect(() =>
      guard.canActivate(
        contextFor(StockController.prototype.processDailyOperations, player),
      ),
    ).toThrow(ForbiddenException);
  });

  it('should prefer permissions carried by the token', () => {
    const auditor: UserPayload = { ...player, permissions: [Permission.REPORTS_VIEW] };

    expect(
      guard.canActivate(contextFor(StockController.prototype.getWasteSummary, auditor)),
    ).toBe(true);
    expect(() =>
      guard.canActivate(contextFor(StockController.prototype.consume, auditor)),
    ).toThrow(ForbiddenException);
  });

  it('should let the owner through every route', () => {
    const owner: UserPayload = { ...player, role: 'owner', permissions: [] };

    expect(
      guard.canActivate(contextFor(StockController.prototype.closeSession, owner)),
    ).toBe(true);
  });

  it('should reject a request that reached it without a user', () => {
    expect(() =>
      guard.canActivate(contextFor(StockController.prototype.listLots)),
    ).toThrow(ForbiddenException);
  });
});
