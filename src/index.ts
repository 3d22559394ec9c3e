import { serve } from '@hono/node-server';
import type { Context } from 'hono';
import { createAliasBroker } from './app.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { createSqliteStorage } from './storage/sqlite/index.js';
import { createBrokerServices } from './services/index.js';
import { getConfig } from './config/index.js';
import { createLogger } from './logging/logger.js';
import type { IUserAuthenticator, AuthenticationResult } from './storage/interfaces/user-storage.js';
import type { IStorage } from './storage/interfaces/index.js';

const logger = createLogger('server');

// Load configuration
const config = getConfig();

/**
 * Example user authenticator for development
 * In production, implement one that reads your login session
 */
class DevelopmentUserAuthenticator implements IUserAuthenticator {
  constructor(private readonly defaultUserId: string) {}

  async authenticate(ctx: Context): Promise<AuthenticationResult> {
    const userId = ctx.req.header('X-User-Id') ?? ctx.req.query('user_id') ?? this.defaultUserId;
    return { authenticated: true, userId };
  }
}

let storage: IStorage;

if (config.database.path) {
  logger.info('Using SQLite storage', { path: config.database.path });
  storage = createSqliteStorage(config.database.path);
} else {
  logger.info('Using in-memory storage (no DATABASE_PATH configured)');
  storage = createMemoryStorage();
}

const services = createBrokerServices(storage, { config });

const devUser =
  (await services.users.findByEmail('dev@example.com')) ??
  (await services.users.register({ email: 'dev@example.com', name: 'Dev User' }));

const app = createAliasBroker({
  storage,
  services,
  userAuthenticator: new DevelopmentUserAuthenticator(devUser.id),
  enableLogging: config.server.nodeEnv !== 'test',
});

const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info('Alias broker listening', {
      url: `http://${info.address}:${info.port}`,
      authorize: `${config.server.publicUrl}/oauth/authorize`,
      token: `${config.server.publicUrl}/oauth/token`,
      userInfo: `${config.server.publicUrl}/oauth/user_info`,
    });
  }
);

const PURGE_INTERVAL_MS = 10 * 60 * 1000;

const purgeTimer = setInterval(() => {
  services.authorization.purgeExpired().catch((error: unknown) => {
    logger.error('Purging expired grants failed', { error });
  });
}, PURGE_INTERVAL_MS);
purgeTimer.unref();

const shutdown = () => {
  clearInterval(purgeTimer);
  server.close((error) => {
    if (error) {
      logger.error('Server close failed', { error });
    }
    storage
      .close()
      .then(() => process.exit(error ? 1 : 0))
      .catch((closeError: unknown) => {
        logger.error('Storage close failed', { error: closeError });
        process.exit(1);
      });
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// Export for programmatic use
export { createAliasBroker } from './app.js';
export { createMemoryStorage } from './storage/memory/index.js';
export { createSqliteStorage } from './storage/sqlite/index.js';
export * from './services/index.js';
export * from './types/index.js';
export * from './storage/interfaces/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
export * from './integrations/billing.js';
export * from './integrations/object-storage.js';
export { createLogger, setLogLevel } from './logging/logger.js';
