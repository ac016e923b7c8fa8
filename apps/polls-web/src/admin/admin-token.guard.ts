import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Request } from 'express';
import { timingSafeEqual } from 'crypto';
import { adminConfig } from '@app/shared/config/configuration';

const BEARER_RE = /^Bearer\s+(.+)$/i;

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = header.match(BEARER_RE);
  return match ? match[1].trim() : null;
}

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

@Injectable()
export class AdminTokenGuard implements CanActivate {
  private readonly logger = new Logger(AdminTokenGuard.name);

  constructor(
    @Inject(adminConfig.KEY)
    private readonly adminCfg: ConfigType<typeof adminConfig>,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    if (!this.adminCfg.token) {
      throw new ForbiddenException('Admin API is disabled (ADMIN_TOKEN is not set)');
    }

    const req = context.switchToHttp().getRequest<Request>();
    const token = extractBearerToken(req.headers.authorization);
    if (!token || !tokensMatch(token, this.adminCfg.token)) {
      this.logger.warn(`Rejected admin request: ${req.method} ${req.originalUrl}`);
      throw new UnauthorizedException('Invalid admin token');
    }
    return true;
  }
}
