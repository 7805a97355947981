import { createHash, randomBytes } from 'node:crypto';

export const generateAccessToken = (): string =>
  randomBytes(32).toString('base64url');

export const hashToken = (token: string): string =>
  createHash('sha256').update(token, 'utf8').digest('hex');
