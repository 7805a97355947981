import type { Request } from 'express';
import {
  ApiTokenEntity,
  OrganizationEntity,
  UserEntity,
} from '../database/entities';

export interface RequestContext {
  user: UserEntity;
  organization: OrganizationEntity;
  token: ApiTokenEntity;
}

export interface AuthenticatedRequest extends Request {
  auth?: RequestContext;
}
