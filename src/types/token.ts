import type { UserInfo } from './binding.js';

/**
 * Authorization code (stored by hash)
 */
export interface AuthorizationCode {
  id: string;
  codeHash: string;
  clientId: string;
  userId: string;
  scope: string;
  redirectUri: string;
  expiresAt: Date;
  issuedAt: Date;
  usedAt?: Date;
}

export interface CreateAuthorizationCodeInput {
  codeHash: string;
  clientId: string;
  userId: string;
  scope: string;
  redirectUri: string;
  expiresAt: Date;
}

/**
 * Opaque access token (stored by hash)
 */
export interface AccessToken {
  id: string;
  tokenHash: string;
  clientId: string;
  userId: string;
  scope: string;
  redirectUri: string;
  expiresAt: Date;
  issuedAt: Date;
  revokedAt?: Date;
}

export interface CreateAccessTokenInput {
  tokenHash: string;
  clientId: string;
  userId: string;
  scope: string;
  redirectUri: string;
  expiresAt: Date;
}

/**
 * Lifecycle of one authorization grant
 */
export type GrantState = 'requested' | 'code_issued' | 'exchanged' | 'active' | 'expired' | 'revoked';

/**
 * Token endpoint response
 */
export interface TokenResponse {
  access_token: string;
  token_type: 'Bearer';
  expires_in: number;
  scope: string;
  user: UserInfo;
}
