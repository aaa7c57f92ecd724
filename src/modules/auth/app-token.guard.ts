import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import { timingSafeEqual } from 'node:crypto';
import { AppConfigService } from '../app/app-config.service';

function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (typeof header !== 'string') return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match?.[1]?.trim() || null;
}

function queryToken(req: Request): string | null {
  const raw = req.query?.token;
  return typeof raw === 'string' && raw.trim() ? raw.trim() : null;
}

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Shared-secret check for the automation client: `?token=` or `Authorization: Bearer`.
 * Without APP_TOKEN configured every request passes (local development).
 */
@Injectable()
export class AppTokenGuard implements CanActivate {
  constructor(private readonly appConfig: AppConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.appConfig.appToken();
    if (!expected) return true;
    const req = context.switchToHttp().getRequest<Request>();
    const given = queryToken(req) ?? bearerToken(req);
    if (!given || !tokensMatch(given, expected)) throw new UnauthorizedException('Unauthorized');
    return true;
  }
}
