import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { AppConfigService } from '../app/app-config.service';
import { AdminGuard } from './admin.guard';

function contextWith(headers: Record<string, string | string[]>) {
  return new ExecutionContextHost([{ headers }, {}, () => undefined]);
}

function guardWith(values: Record<string, string>) {
  return new AdminGuard(new AppConfigService(new ConfigService(values)));
}

describe('AdminGuard', () => {
  it('lets requests with the configured token through', () => {
    const guard = guardWith({ ADMIN_API_TOKEN: 'test-admin-token' });
    expect(guard.canActivate(contextWith({ 'x-admin-token': 'test-admin-token' }))).toBe(true);
  });

  it('answers 404 for a wrong or missing token', () => {
    const guard = guardWith({ ADMIN_API_TOKEN: 'test-admin-token' });
    expect(() => guard.canActivate(contextWith({ 'x-admin-token': 'test-admin-tokem' }))).toThrow(NotFoundException);
    expect(() => guard.canActivate(contextWith({ 'x-admin-token': 'short' }))).toThrow(NotFoundException);
    expect(() => guard.canActivate(contextWith({}))).toThrow(NotFoundException);
  });

  it('closes the admin surface when no token is configured', () => {
    const guard = guardWith({});
    expect(() => guard.canActivate(contextWith({ 'x-admin-token': '' }))).toThrow(NotFoundException);
  });
});
