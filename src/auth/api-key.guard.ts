// File overview:
// - Purpose: Shared-secret guard for admin endpoints.
// - Provides: `api-key` header extraction and constant-time comparison against the configured key.
// - Security: Rejects missing or wrong keys with 401 before the handler runs; the key itself is never logged.
import { CanActivate, ExecutionContext, Inject, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { timingSafeEqual } from 'crypto';
import { Request } from 'express';
import { appConfig, AppConfig } from '../config/app.config';

export const API_KEY_HEADER = 'api-key';

/** Compare two secrets without leaking the position of the first mismatch. */
export function safeCompare(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  if (a.length !== b.length) {
    // keep the work proportional to the expected key
    timingSafeEqual(b, b);
    return false;
  }
  return timingSafeEqual(a, b);
}

@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);

  constructor(@Inject(appConfig.KEY) private readonly config: AppConfig) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const apiKey = this.extractApiKey(request);

    if (apiKey === undefined) {
      this.logger.warn(`Missing API key header: ${request.method} ${request.path}`);
      throw new UnauthorizedException('Missing api-key header');
    }

    if (!safeCompare(apiKey, this.config.apiKey)) {
      this.logger.warn(`Invalid API key: ${request.method} ${request.path}`);
      throw new UnauthorizedException('Invalid API key');
    }

    return true;
  }

  private extractApiKey(request: Request): string | undefined {
    const header = request.headers[API_KEY_HEADER];
    // node joins a repeated header into one comma-separated value, which never matches
    return typeof header === 'string' ? header : undefined;
  }
}
