import type { Binding } from '../types/binding.js';
import type { Client } from '../types/client.js';
import type { Scope } from '../types/scope.js';
import type { AccessToken, AuthorizationCode, GrantState, TokenResponse } from '../types/token.js';
import type { UserInfo } from '../types/binding.js';
import type { IStorage, StorageSession } from '../storage/interfaces/index.js';
import type { IdentifierGenerator } from './identifier-generator.js';
import type { BindingService } from './binding-service.js';
import type { UserService } from './user-service.js';
import { scopeService, DeclaredScopeGrantPolicy, type ScopeGrantPolicy } from './scope-service.js';
import { scopeProjector } from './scope-projector.js';
import { hashToken } from '../crypto/hash.js';
import { OAuthError } from '../errors/oauth-error.js';
import {
  DEFAULT_ACCESS_TOKEN_TTL,
  DEFAULT_AUTHORIZATION_CODE_TTL,
  TOKEN_TYPE_BEARER,
} from '../config/constants.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('authorization');

export interface AuthorizationServiceOptions {
  storage: IStorage;
  generator: IdentifierGenerator;
  bindings: BindingService;
  users: UserService;
  scopePolicy?: ScopeGrantPolicy;
  authorizationCodeTtl?: number;
  accessTokenTtl?: number;
}

export interface AuthorizeRequest {
  clientId: string;
  redirectUri: string;
  userId: string;
  scope?: string;
  state?: string;
}

export interface AuthorizeResult {
  code: string;
  redirectTo: string;
  binding: Binding;
  scopes: Scope[];
  expiresAt: Date;
}

export interface ExchangeRequest {
  client: Client;
  code: string;
  redirectUri: string;
}

/**
 * State of an authorization code
 */
export function authorizationCodeState(code: AuthorizationCode, now: Date = new Date()): GrantState {
  if (code.usedAt) return 'exchanged';
  if (code.expiresAt <= now) return 'expired';
  return 'code_issued';
}

/**
 * State of an access token; revoked and expired are terminal
 */
export function accessTokenState(token: AccessToken, now: Date = new Date()): GrantState {
  if (token.revokedAt) return 'revoked';
  if (token.expiresAt <= now) return 'expired';
  return 'active';
}

/**
 * Issues authorization codes and access tokens and serves the disclosed identity
 */
export class AuthorizationService {
  private readonly storage: IStorage;
  private readonly generator: IdentifierGenerator;
  private readonly bindings: BindingService;
  private readonly users: UserService;
  private readonly scopePolicy: ScopeGrantPolicy;
  private readonly authorizationCodeTtl: number;
  private readonly accessTokenTtl: number;

  constructor(options: AuthorizationServiceOptions) {
    this.storage = options.storage;
    this.generator = options.generator;
    this.bindings = options.bindings;
    this.users = options.users;
    this.scopePolicy = options.scopePolicy ?? new DeclaredScopeGrantPolicy();
    this.authorizationCodeTtl = options.authorizationCodeTtl ?? DEFAULT_AUTHORIZATION_CODE_TTL;
    this.accessTokenTtl = options.accessTokenTtl ?? DEFAULT_ACCESS_TOKEN_TTL;
  }

  /**
   * Find the client of an authorization request and check its redirect_uri.
   * Errors from here must not be sent to the redirect_uri.
   */
  async resolveClient(clientId: string, redirectUri: string, state?: string): Promise<Client> {
    const client = await this.storage.transaction((session) => session.clients.findByClientId(clientId));

    if (!client) {
      throw OAuthError.unauthorizedClient(`Unknown client: ${clientId}`, state);
    }

    if (!client.redirectUris.includes(redirectUri)) {
      throw OAuthError.invalidRequest('Invalid redirect_uri', state);
    }

    return client;
  }

  /**
   * requested -> code_issued
   *
   * Resolves the consent binding, then issues a single-use code bound to
   * (client, user, scope, redirect_uri).
   */
  async authorize(request: AuthorizeRequest, now: Date = new Date()): Promise<AuthorizeResult> {
    const { redirectUri, state } = request;

    const client = await this.resolveClient(request.clientId, redirectUri, state);
    const user = await this.users.findById(request.userId);
    if (!user) {
      throw OAuthError.accessDenied('Unknown user', state);
    }

    const scopes = this.scopePolicy.grantScopes(client, request.scope, state);
    const binding = await this.bindings.getOrCreateBinding(client, user, scopes, now);

    const scope = scopeService.formatScopes(scopes);
    const expiresAt = new Date(now.getTime() + this.authorizationCodeTtl * 1000);

    const { value: code } = await this.storage.transaction((session) =>
      this.generator.allocate('auth_code', {
        exists: async (value) => (await session.authorizationCodes.findByHash(hashToken(value))) !== null,
        reserve: (value) =>
          session.authorizationCodes.create({
            codeHash: hashToken(value),
            clientId: client.id,
            userId: user.id,
            scope,
            redirectUri,
            expiresAt,
          }),
      })
    );

    logger.info('Authorization code issued', { clientId: client.clientId, userId: user.id, scope });

    const url = new URL(redirectUri);
    url.searchParams.set('code', code);
    if (state) {
      url.searchParams.set('state', state);
    }

    return { code, redirectTo: url.toString(), binding, scopes, expiresAt };
  }

  /**
   * code_issued -> exchanged -> active
   *
   * Consuming the code and inserting the token happen in one unit of work;
   * any failure leaves the code unconsumed.
   */
  async exchange(request: ExchangeRequest, now: Date = new Date()): Promise<TokenResponse> {
    const { client, code, redirectUri } = request;

    return this.storage.transaction(async (session) => {
      const record = await session.authorizationCodes.findByHash(hashToken(code));
      if (!record) {
        throw OAuthError.invalidGrant('Invalid authorization code');
      }

      if (record.usedAt) {
        logger.warn('Authorization code replayed', { codeId: record.id, clientId: client.clientId });
        throw OAuthError.invalidGrant('Authorization code has already been used');
      }

      if (record.expiresAt <= now) {
        throw OAuthError.expiredGrant();
      }

      if (record.clientId !== client.id) {
        throw OAuthError.invalidGrant('Authorization code was not issued to this client');
      }

      if (record.redirectUri !== redirectUri) {
        throw OAuthError.invalidGrant('redirect_uri does not match the authorization request');
      }

      // Conditional update: a concurrent exchange that got here first wins
      if (!(await session.authorizationCodes.consume(record.id, now))) {
        throw OAuthError.invalidGrant('Authorization code has already been used');
      }

      const expiresAt = new Date(now.getTime() + this.accessTokenTtl * 1000);
      const { value: accessToken } = await this.generator.allocate('access_token', {
        exists: async (value) => (await session.accessTokens.findByHash(hashToken(value))) !== null,
        reserve: (value) =>
          session.accessTokens.create({
            tokenHash: hashToken(value),
            clientId: record.clientId,
            userId: record.userId,
            scope: record.scope,
            redirectUri: record.redirectUri,
            expiresAt,
          }),
      });

      const user = await this.projectUserInfo(session, record.clientId, record.userId, record.scope);

      logger.info('Access token issued', { clientId: client.clientId, userId: record.userId });

      return {
        access_token: accessToken,
        token_type: TOKEN_TYPE_BEARER,
        expires_in: this.accessTokenTtl,
        scope: record.scope,
        user,
      };
    });
  }

  /**
   * Look up an active access token
   *
   * @throws OAuthError invalid_token when unknown, revoked or expired
   */
  async authenticateAccessToken(value: string, now: Date = new Date()): Promise<AccessToken> {
    const token = await this.storage.transaction((session) =>
      session.accessTokens.findByHash(hashToken(value))
    );

    if (!token) {
      throw OAuthError.invalidToken('Unknown access token');
    }

    switch (accessTokenState(token, now)) {
      case 'revoked':
        throw OAuthError.invalidToken('Access token has been revoked');
      case 'expired':
        throw OAuthError.invalidToken('Access token has expired');
      default:
        return token;
    }
  }

  /**
   * Identity disclosed to the token's client
   */
  async userInfo(token: AccessToken): Promise<UserInfo> {
    return this.storage.transaction((session) =>
      this.projectUserInfo(session, token.clientId, token.userId, token.scope)
    );
  }

  /**
   * Revoke a token (RFC 7009). Unknown tokens and tokens of other clients
   * are ignored.
   */
  async revokeAccessToken(value: string, client: Client, now: Date = new Date()): Promise<void> {
    await this.storage.transaction(async (session) => {
      const token = await session.accessTokens.findByHash(hashToken(value));
      if (!token || token.clientId !== client.id) {
        return;
      }

      if (await session.accessTokens.revoke(token.id, now)) {
        logger.info('Access token revoked', { tokenId: token.id, clientId: client.clientId });
      }
    });
  }

  /**
   * Drop expired codes and tokens
   */
  async purgeExpired(now: Date = new Date()): Promise<{ authorizationCodes: number; accessTokens: number }> {
    const purged = await this.storage.transaction(async (session) => ({
      authorizationCodes: await session.authorizationCodes.deleteExpired(now),
      accessTokens: await session.accessTokens.deleteExpired(now),
    }));

    if (purged.authorizationCodes > 0 || purged.accessTokens > 0) {
      logger.info('Expired grants purged', purged);
    }
    return purged;
  }

  private async projectUserInfo(
    session: StorageSession,
    clientId: string,
    userId: string,
    scope: string
  ): Promise<UserInfo> {
    const binding = await session.bindings.find(clientId, userId);
    const client = await session.clients.findById(clientId);
    const user = await session.users.findById(userId);

    if (!binding || !client || !user) {
      throw OAuthError.serverError('Consent binding is missing for this grant');
    }

    const alias =
      binding.channel.kind === 'alias' ? await session.aliases.findById(binding.channel.aliasId) : null;

    return scopeProjector.project(
      { binding, client, user, alias, avatarUrl: this.users.avatarUrl(user) },
      scopeService.parseScopes(scope)
    );
  }
}
