import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';

export function maskKey(token: string): string {
  return token.length > 8 ? `${token.slice(0, 4)}...${token.slice(-4)}` : '****';
}

export function extractBearerToken(request: Request): string | undefined {
  const authHeader = request.headers.authorization;
  if (!authHeader) return undefined;

  const [type, token] = authHeader.split(' ');
  return type === 'Bearer' && token ? token : undefined;
}

/**
 * Protects the API routes with `PROXY_API_KEY` when one is configured.
 * Accepts a Bearer token, `x-goog-api-key`, or the `key` query parameter.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const apiKey = this.configService.get<string>('proxyApiKey');
    if (!apiKey) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const token = this.extractKey(request);

    if (!token) {
      throw new UnauthorizedException(
        'Missing API key. Provide it as a Bearer token, the x-goog-api-key header or the key query parameter.',
      );
    }

    if (token !== apiKey) {
      throw new UnauthorizedException(
        `Invalid API key provided: ${maskKey(token)}`,
      );
    }

    return true;
  }

  private extractKey(request: Request): string | undefined {
    const bearer = extractBearerToken(request);
    if (bearer) return bearer;

    const header = request.headers['x-goog-api-key'];
    if (typeof header === 'string' && header) return header;

    const query = request.query.key;
    return typeof query === 'string' && query ? query : undefined;
  }
}
