import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import * as constants from './constants.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(envVar: string): string | undefined {
  const fileEnvVar = `${envVar}_FILE`;
  const filePath = process.env[fileEnvVar];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (error) {
      console.warn(`Warning: Could not read secret from ${filePath}`, error);
    }
  }

  return process.env[envVar];
}

function readInt(envVar: string, fallback: number): number {
  const raw = process.env[envVar];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`${envVar} must be an integer, got "${raw}"`);
  }
  return value;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Which channel a new binding discloses when the email scope is granted
 */
export const DISCLOSURE_POLICIES = ['always_alias', 'premium_alias', 'always_real_email'] as const;
export type DisclosurePolicy = (typeof DISCLOSURE_POLICIES)[number];

const logLevelSchema = z.enum(LOG_LEVELS);
const disclosurePolicySchema = z.enum(DISCLOSURE_POLICIES);

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    publicUrl: string;
  };
  database: {
    path: string | undefined;
  };
  secrets: {
    stripeApiKey: string | undefined;
  };
  logging: {
    level: LogLevel;
  };
  aliases: {
    emailDomain: string;
    maxAliasesOnFreePlan: number;
    disclosurePolicy: DisclosurePolicy;
  };
  generation: {
    maxAttempts: number;
  };
  objectStorage: {
    baseUrl: string | undefined;
  };
  defaults: {
    accessTokenTtl: number;
    authorizationCodeTtl: number;
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  return {
    server: {
      port: readInt('PORT', 3000),
      host: process.env['HOST'] ?? '0.0.0.0',
      nodeEnv: process.env['NODE_ENV'] ?? 'development',
      publicUrl: process.env['URL'] ?? constants.DEFAULT_PUBLIC_URL,
    },
    database: {
      path: process.env['DATABASE_PATH'],
    },
    secrets: {
      stripeApiKey: readSecret('STRIPE_API_KEY'),
    },
    logging: {
      level: logLevelSchema.parse(process.env['LOG_LEVEL'] ?? 'info'),
    },
    aliases: {
      emailDomain: process.env['EMAIL_DOMAIN'] ?? constants.DEFAULT_EMAIL_DOMAIN,
      maxAliasesOnFreePlan: readInt('MAX_NB_EMAIL_FREE_PLAN', constants.DEFAULT_MAX_NB_EMAIL_FREE_PLAN),
      disclosurePolicy: disclosurePolicySchema.parse(process.env['DISCLOSURE_POLICY'] ?? 'always_alias'),
    },
    generation: {
      maxAttempts: readInt('MAX_GENERATION_ATTEMPTS', constants.DEFAULT_MAX_GENERATION_ATTEMPTS),
    },
    objectStorage: {
      baseUrl: process.env['OBJECT_STORAGE_URL'],
    },
    defaults: {
      accessTokenTtl: readInt('DEFAULT_ACCESS_TOKEN_TTL', constants.DEFAULT_ACCESS_TOKEN_TTL),
      authorizationCodeTtl: readInt(
        'DEFAULT_AUTHORIZATION_CODE_TTL',
        constants.DEFAULT_AUTHORIZATION_CODE_TTL
      ),
    },
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
