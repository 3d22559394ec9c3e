import { createLogger } from '../logging/logger.js';
import { GenerationExhaustedError } from '../errors/broker-error.js';
import { UniqueConstraintError } from '../errors/storage-error.js';
import { generateRandomBase64Url, pickRandom, randomString } from '../crypto/random.js';
import {
  ACCOUNT_CODE_LENGTH,
  ALIAS_SUFFIX_LENGTH,
  CLIENT_ID_SUFFIX_LENGTH,
  CLIENT_SECRET_LENGTH,
  DEFAULT_MAX_GENERATION_ATTEMPTS,
  OPAQUE_TOKEN_BYTES,
} from '../config/constants.js';
import { loadWordList } from './word-list.js';

const logger = createLogger('identifier-generator');

export type IdentifierKind =
  | 'alias'
  | 'client_id'
  | 'client_secret'
  | 'auth_code'
  | 'access_token'
  | 'account_code';

// Never written to logs
const SECRET_KINDS: ReadonlySet<IdentifierKind> = new Set([
  'client_secret',
  'auth_code',
  'access_token',
  'account_code',
]);

export interface IdentifierGeneratorOptions {
  emailDomain: string;
  maxAttempts?: number;
  words?: readonly string[];
}

export interface GenerateOptions {
  /**
   * Human-chosen input, e.g. the application name for a client_id
   */
  seed?: string;
  /**
   * Uniqueness authority: true when the candidate is already taken
   */
  exists: (candidate: string) => Promise<boolean>;
}

export interface AllocateOptions<T> extends GenerateOptions {
  /**
   * Persist the candidate. A UniqueConstraintError means another writer
   * took it between the existence check and this write.
   */
  reserve: (candidate: string) => Promise<T>;
}

export interface Allocation<T> {
  value: string;
  record: T;
}

/**
 * Normalize an application name into an identifier prefix
 * ("Café Démo!" -> "cafe-demo")
 */
export function toIdentifierSlug(name: string): string {
  const slug = name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

  return slug || 'client';
}

/**
 * Produces unique identifiers with a bounded number of collision retries
 */
export class IdentifierGenerator {
  private readonly emailDomain: string;
  private readonly maxAttempts: number;
  private readonly words: readonly string[] | undefined;

  constructor(options: IdentifierGeneratorOptions) {
    this.emailDomain = options.emailDomain;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_GENERATION_ATTEMPTS;
    this.words = options.words;
  }

  /**
   * Build one candidate without consulting any authority
   */
  candidate(kind: IdentifierKind, seed?: string): string {
    switch (kind) {
      case 'alias': {
        const words = this.words ?? loadWordList();
        return `${pickRandom(words)}_${pickRandom(words)}_${randomString(ALIAS_SUFFIX_LENGTH)}@${this.emailDomain}`;
      }
      case 'client_id':
        return `${toIdentifierSlug(seed ?? '')}-${randomString(CLIENT_ID_SUFFIX_LENGTH)}`;
      case 'client_secret':
        // base64url encodes 3 bytes per 4 characters
        return generateRandomBase64Url((CLIENT_SECRET_LENGTH / 4) * 3);
      case 'auth_code':
      case 'access_token':
        return generateRandomBase64Url(OPAQUE_TOKEN_BYTES);
      case 'account_code':
        return randomString(ACCOUNT_CODE_LENGTH);
    }
  }

  /**
   * Generate a candidate the authority reports as unused
   *
   * @throws GenerationExhaustedError after `maxAttempts` collisions
   */
  async generate(kind: IdentifierKind, options: GenerateOptions): Promise<string> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const candidate = this.candidate(kind, options.seed);

      if (!(await options.exists(candidate))) {
        this.logAccepted(kind, candidate, attempt);
        return candidate;
      }

      this.logCollision(kind, candidate, attempt);
    }

    throw this.exhausted(kind);
  }

  /**
   * Generate and persist in one step, retrying when the write loses a race.
   * Collisions found by `exists` and by `reserve` share the attempt budget.
   */
  async allocate<T>(kind: IdentifierKind, options: AllocateOptions<T>): Promise<Allocation<T>> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const candidate = this.candidate(kind, options.seed);

      if (await options.exists(candidate)) {
        this.logCollision(kind, candidate, attempt);
        continue;
      }

      try {
        const record = await options.reserve(candidate);
        this.logAccepted(kind, candidate, attempt);
        return { value: candidate, record };
      } catch (error) {
        if (!(error instanceof UniqueConstraintError)) {
          throw error;
        }
        logger.warn('Identifier reserved concurrently, regenerating', {
          kind,
          attempt,
          constraint: error.constraint,
        });
      }
    }

    throw this.exhausted(kind);
  }

  private logAccepted(kind: IdentifierKind, candidate: string, attempt: number): void {
    if (SECRET_KINDS.has(kind)) {
      logger.debug('Identifier generated', { kind, attempt });
    } else {
      logger.debug('Identifier generated', { kind, attempt, value: candidate });
    }
  }

  private logCollision(kind: IdentifierKind, candidate: string, attempt: number): void {
    if (SECRET_KINDS.has(kind)) {
      logger.warn('Identifier collision, regenerating', { kind, attempt });
    } else {
      logger.warn('Identifier collision, regenerating', { kind, attempt, value: candidate });
    }
  }

  private exhausted(kind: IdentifierKind): GenerationExhaustedError {
    logger.error('Identifier generation exhausted', { kind, attempts: this.maxAttempts });
    return new GenerationExhaustedError(kind, this.maxAttempts);
  }
}
