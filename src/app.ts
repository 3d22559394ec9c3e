import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { BrokerEnv } from './types/hono.js';
import type { IStorage, IUserAuthenticator } from './storage/interfaces/index.js';
import { brokerErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { createBrokerServices, type BrokerServices, type BrokerServiceOptions } from './services/index.js';
import { createOAuthRoutes } from './routes/oauth/index.js';
import { createApiRoutes } from './routes/api/index.js';

export interface AliasBrokerOptions {
  storage: IStorage;
  userAuthenticator: IUserAuthenticator;
  /**
   * Prebuilt services; built over `storage` when omitted
   */
  services?: BrokerServices;
  serviceOptions?: BrokerServiceOptions;
  enableCors?: boolean;
  enableLogging?: boolean;
}

/**
 * Create the identity broker application
 */
export function createAliasBroker(options: AliasBrokerOptions): Hono<BrokerEnv> {
  const { storage, userAuthenticator, enableCors = true, enableLogging = true } = options;
  const services = options.services ?? createBrokerServices(storage, options.serviceOptions);

  const app = new Hono<BrokerEnv>();

  // Global error handler
  app.onError(brokerErrorHandler);

  app.use('*', securityHeaders());

  if (enableLogging) {
    app.use('*', requestLogger());
  }

  // CORS (token and user_info are called from relying parties)
  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type'],
        exposeHeaders: ['WWW-Authenticate'],
        maxAge: 86400,
      })
    );
  }

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route('/oauth', createOAuthRoutes({ services, userAuthenticator }));
  app.route('/api', createApiRoutes({ services, userAuthenticator }));

  app.notFound((c) => c.json({ error: 'not_found', error_description: 'Route not found' }, 404));

  return app;
}
