import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { DataSource, IsNull } from 'typeorm';
import {
  ApiTokenEntity,
  OrganizationEntity,
  UserEntity,
} from '../database/entities';
import { logger } from '../logger/logger.config';
import { hashToken } from '../security/token.util';
import { AuthenticatedRequest, RequestContext } from './request-context';

/**
 * Resolves `Authorization: Bearer <token>` to the calling user and
 * organization. Revoked tokens are rejected.
 */
@Injectable()
export class BearerAuthGuard implements CanActivate {
  private readonly logger = logger();

  constructor(private readonly dataSource: DataSource) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = this.extractToken(request.headers.authorization);
    if (!token) {
      throw new UnauthorizedException('Missing bearer token.');
    }

    request.auth = await this.resolve(token);
    return true;
  }

  async resolve(token: string): Promise<RequestContext> {
    const manager = this.dataSource.manager;

    const apiToken = await manager.findOneBy(ApiTokenEntity, {
      tokenHash: hashToken(token),
      revokedAt: IsNull(),
    });
    if (!apiToken) {
      this.logger.warn('Rejected unknown or revoked bearer token');
      throw new UnauthorizedException('Invalid or expired token.');
    }

    const user = await manager.findOneBy(UserEntity, { id: apiToken.userId });
    if (!user) {
      throw new UnauthorizedException('Token user not found.');
    }

    const organization = await manager.findOneBy(OrganizationEntity, {
      id: user.organizationId,
    });
    if (!organization) {
      throw new UnauthorizedException('Organization not found.');
    }

    return { user, organization, token: apiToken };
  }

  private extractToken(header: string | undefined): string | null {
    if (!header) return null;
    const [scheme, credentials] = header.trim().split(/\s+/, 2);
    if (scheme.toLowerCase() !== 'bearer' || !credentials) return null;
    return credentials;
  }
}
