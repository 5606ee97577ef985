import { CanActivate, ExecutionContext, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import { Request } from 'express';
import { AppConfig } from '../config/configuration';

/**
 * Operator API key check for control routes. Off unless AUTH_ENFORCE=true.
 * Accepts `x-api-key: <key>` or `Authorization: Bearer <key>`.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly enforce: boolean;
  private readonly expectedKey: Buffer | null;

  constructor(configService: ConfigService<AppConfig, true>) {
    const auth = configService.get('auth', { infer: true });
    this.enforce = auth.enforce;
    this.expectedKey = auth.apiKey ? Buffer.from(auth.apiKey, 'utf-8') : null;
  }

  canActivate(context: ExecutionContext): boolean {
    if (!this.enforce) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const provided = this.extractKey(request);

    if (!provided || !this.matches(provided)) {
      this.logger.warn(`Rejected ${request.method} ${request.url}: missing or invalid API key`);
      throw new UnauthorizedException('Missing or invalid API key');
    }
    return true;
  }

  private extractKey(request: Request): string | undefined {
    const headerKey = request.headers['x-api-key'];
    if (typeof headerKey === 'string' && headerKey.length > 0) {
      return headerKey;
    }

    const authorization = request.headers.authorization;
    if (authorization?.startsWith('Bearer ')) {
      return authorization.slice(7);
    }
    return undefined;
  }

  private matches(provided: string): boolean {
    if (!this.expectedKey) {
      return false;
    }
    const received = Buffer.from(provided, 'utf-8');
    if (received.length !== this.expectedKey.length) {
      return false;
    }
    return timingSafeEqual(received, this.expectedKey);
  }
}
