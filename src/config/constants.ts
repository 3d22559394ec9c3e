/**
 * Broker constants
 */

// Grant and response types
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const RESPONSE_TYPE_CODE = 'code' as const;

// Token types
export const TOKEN_TYPE_BEARER = 'Bearer' as const;

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_AUTHORIZATION_CODE_TTL = 600; // 10 minutes
export const ACCOUNT_CODE_TTL = 3600; // activation and password reset codes

// Identifier generation
export const DEFAULT_MAX_GENERATION_ATTEMPTS = 10;
export const CLIENT_SECRET_LENGTH = 40; // characters
export const CLIENT_ID_SUFFIX_LENGTH = 10; // characters
export const ALIAS_SUFFIX_LENGTH = 4; // characters
export const ACCOUNT_CODE_LENGTH = 32; // characters
export const OPAQUE_TOKEN_BYTES = 32;

// Plans
export const DEFAULT_MAX_NB_EMAIL_FREE_PLAN = 3;
export const TRIAL_PROMPT_WINDOW_DAYS = 7;

// External defaults
export const DEFAULT_EMAIL_DOMAIN = 'sl.local';
export const DEFAULT_PUBLIC_URL = 'http://localhost:3000';
export const GRAVATAR_BASE_URL = 'https://www.gravatar.com/avatar';
export const DEFAULT_CLIENT_ICON_PATH = '/static/default-icon.svg';

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';

// Content types
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
