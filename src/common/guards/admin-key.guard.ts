import {
  Injectable,
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { extractBearerToken, maskKey } from './api-key.guard';

/**
 * Guards the admin routes with `ADMIN_API_KEY`. Without a configured key
 * the admin surface stays closed.
 */
@Injectable()
export class AdminKeyGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const adminKey = this.configService.get<string>('adminApiKey');
    if (!adminKey) {
      throw new ForbiddenException('Admin API is disabled: ADMIN_API_KEY is not set');
    }

    const request = context.switchToHttp().getRequest<Request>();
    const header = request.headers['x-admin-key'];
    const token =
      extractBearerToken(request) ??
      (typeof header === 'string' ? header : undefined);

    if (!token) {
      throw new UnauthorizedException('Missing admin key');
    }
    if (token !== adminKey) {
      throw new UnauthorizedException(`Invalid admin key provided: ${maskKey(token)}`);
    }

    return true;
  }
}
