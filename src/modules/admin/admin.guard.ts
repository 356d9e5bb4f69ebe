import { CanActivate, ExecutionContext, Injectable, NotFoundException } from '@nestjs/common';
import type { Request } from 'express';
import { timingSafeEqual } from 'node:crypto';
import { AppConfigService } from '../app/app-config.service';

export const ADMIN_TOKEN_HEADER = 'x-admin-token';

function sameToken(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

@Injectable()
export class AdminGuard implements CanActivate {
  constructor(private readonly appConfig: AppConfigService) {}

  canActivate(context: ExecutionContext) {
    const req = context.switchToHttp().getRequest<Request>();
    const expected = this.appConfig.adminApiToken();
    const header = req.headers[ADMIN_TOKEN_HEADER];
    const provided = (Array.isArray(header) ? header[0] : header)?.trim() ?? '';

    // Hide existence of admin routes from everyone without the token.
    if (!expected || !provided || !sameToken(provided, expected)) throw new NotFoundException();
    return true;
  }
}
