import { ConflictException, Injectable } from '@nestjs/common';
import { RequestContext } from '../../core/auth';
import { isUniqueViolation } from '../../core/database/database-errors';
import { TransactionRunner } from '../../core/database/transaction-runner';
import {
  ApiTokenEntity,
  OrganizationEntity,
  UserEntity,
} from '../../core/database/entities';
import { logger } from '../../core/logger/logger.config';
import {
  generateAccessToken,
  hashToken,
} from '../../core/security/token.util';
import { toSubscriptionResponse } from '../billing/dto/subscription-response.dto';
import { SubscriptionService } from '../billing/services/subscription.service';
import {
  toOrganizationResponse,
  toUserResponse,
} from '../organizations/dto/organization-response.dto';
import { AuthResponseDto, TokenResponseDto } from './dto/auth-response.dto';
import { RegisterDto } from './dto/register.dto';

@Injectable()
export class AuthService {
  private readonly logger = logger();

  constructor(
    private readonly transactions: TransactionRunner,
    private readonly subscriptionService: SubscriptionService,
  ) {}

  /**
   * Creates organization, owner, default subscription and first token in one
   * transaction. Any conflict rolls all four back.
   */
  async register(payload: RegisterDto): Promise<AuthResponseDto> {
    const slug = payload.organization_slug.trim();
    const accessToken = generateAccessToken();

    try {
      const result = await this.transactions.run(async (manager) => {
        const taken = await manager.existsBy(OrganizationEntity, { slug });
        if (taken) {
          throw new ConflictException('Organization slug already exists.');
        }

        const organization = await manager.save(
          manager.create(OrganizationEntity, {
            name: payload.organization_name.trim(),
            slug,
          }),
        );
        const user = await manager.save(
          manager.create(UserEntity, {
            organizationId: organization.id,
            email: payload.email.trim().toLowerCase(),
            fullName: payload.full_name.trim(),
          }),
        );
        const subscription = await this.subscriptionService.getOrCreateSubscription(
          manager,
          organization.id,
        );
        await manager.save(
          manager.create(ApiTokenEntity, {
            userId: user.id,
            tokenHash: hashToken(accessToken),
            revokedAt: null,
          }),
        );

        return { organization, user, subscription };
      });

      this.logger.info(
        { organizationId: result.organization.id, slug },
        'Organization registered',
      );

      return {
        access_token: accessToken,
        token_type: 'bearer',
        organization: toOrganizationResponse(result.organization),
        user: toUserResponse(result.user),
        subscription: toSubscriptionResponse(result.subscription),
      };
    } catch (error: unknown) {
      if (error instanceof ConflictException) {
        this.logger.warn({ slug }, 'Registration rejected: slug taken');
        throw error;
      }
      if (isUniqueViolation(error)) {
        this.logger.warn({ slug }, 'Registration rejected: unique conflict');
        throw new ConflictException(
          'Unable to register organization with provided data.',
        );
      }
      throw error;
    }
  }

  /**
   * Revokes the presented token and issues a replacement
   */
  async rotateToken(context: RequestContext): Promise<TokenResponseDto> {
    const accessToken = generateAccessToken();

    await this.transactions.run(async (manager) => {
      await manager.update(
        ApiTokenEntity,
        { id: context.token.id },
        { revokedAt: new Date() },
      );
      await manager.save(
        manager.create(ApiTokenEntity, {
          userId: context.user.id,
          tokenHash: hashToken(accessToken),
          revokedAt: null,
        }),
      );
    });

    this.logger.info(
      { userId: context.user.id, revokedTokenId: context.token.id },
      'Access token rotated',
    );

    return { access_token: accessToken, token_type: 'bearer' };
  }
}
