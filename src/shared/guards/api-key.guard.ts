import { Injectable, CanActivate, ExecutionContext, UnauthorizedException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { createHash, timingSafeEqual } from 'crypto';

/**
 * Requires a matching `X-API-Key` header on every non-preflight request.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly apiKeyDigest: Buffer | undefined;

  /* v8 ignore next - false positive on constructor parameter property */
  constructor(private readonly configService: ConfigService) {
    const apiKey = this.configService.get<string>('vcs.main.apiKey');
    this.apiKeyDigest = apiKey ? this.digest(apiKey) : undefined;

    if (!this.apiKeyDigest) {
      this.logger.error('VCS_API_KEY not configured - all protected endpoints will reject requests');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();

    if (request.method === 'OPTIONS') {
      return true;
    }

    const providedKey = this.extractApiKey(request);

    if (!providedKey) {
      this.logger.warn(`API request without credentials path=${request.path}`);
      throw new UnauthorizedException('Missing X-API-Key header');
    }

    if (!this.apiKeyDigest) {
      throw new UnauthorizedException('API authentication not configured');
    }

    // Digests have a fixed length, so the comparison leaks neither content nor key length
    if (!timingSafeEqual(this.digest(providedKey), this.apiKeyDigest)) {
      this.logger.warn(`API request with invalid API key path=${request.path}`);
      throw new UnauthorizedException('Invalid API key');
    }

    return true;
  }

  private digest(value: string): Buffer {
    return createHash('sha256').update(value, 'utf8').digest();
  }

  private extractApiKey(request: Request): string | undefined {
    const header = request.headers['x-api-key'];
    return typeof header === 'string' && header.length > 0 ? header : undefined;
  }
}
