import { timingSafeEqual } from 'crypto';
import { Injectable, CanActivate, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';

/**
 * Requires a matching X-API-Key header when API_SECRET_KEY is set;
 * open otherwise.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly expectedKey: Buffer | null;

  constructor(configService: ConfigService) {
    const key = configService.get<string>('API_SECRET_KEY');
    this.expectedKey = key ? Buffer.from(key) : null;
  }

  canActivate(context: ExecutionContext): boolean {
    if (!this.expectedKey) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const header = request.headers['x-api-key'];
    const provided = Buffer.from(typeof header === 'string' ? header : '');

    if (provided.length !== this.expectedKey.length || !timingSafeEqual(provided, this.expectedKey)) {
      throw new UnauthorizedException('Invalid API key');
    }

    return true;
  }
}
