import type { IStorage } from '../storage/interfaces/index.js';
import type { IObjectStorage } from '../integrations/object-storage.js';
import type { IBillingProvider } from '../integrations/billing.js';
import type { Config } from '../config/index.js';
import type { ScopeGrantPolicy } from './scope-service.js';
import { getConfig } from '../config/index.js';
import { PublicBucketStorage } from '../integrations/object-storage.js';
import { createBillingProvider } from '../integrations/billing.js';
import { IdentifierGenerator } from './identifier-generator.js';
import { PlanService } from './plan-service.js';
import { AliasService } from './alias-service.js';
import { BindingService } from './binding-service.js';
import { UserService } from './user-service.js';
import { ClientService } from './client-service.js';
import { AuthorizationService } from './authorization-service.js';

export * from './identifier-generator.js';
export * from './plan-service.js';
export * from './alias-service.js';
export * from './binding-service.js';
export * from './user-service.js';
export * from './client-service.js';
export * from './authorization-service.js';
export * from './scope-service.js';
export * from './scope-projector.js';

export interface BrokerServices {
  generator: IdentifierGenerator;
  plans: PlanService;
  aliases: AliasService;
  bindings: BindingService;
  users: UserService;
  clients: ClientService;
  authorization: AuthorizationService;
}

export interface BrokerServiceOptions {
  config?: Config;
  objectStorage?: IObjectStorage;
  billing?: IBillingProvider;
  scopePolicy?: ScopeGrantPolicy;
  words?: readonly string[];
}

/**
 * Wire the broker services over one storage
 */
export function createBrokerServices(storage: IStorage, options: BrokerServiceOptions = {}): BrokerServices {
  const config = options.config ?? getConfig();
  const objectStorage =
    options.objectStorage ??
    new PublicBucketStorage(config.objectStorage.baseUrl ?? `${config.server.publicUrl}/uploads/`);
  const billing = options.billing ?? createBillingProvider(config.secrets.stripeApiKey);

  const generator = new IdentifierGenerator({
    emailDomain: config.aliases.emailDomain,
    maxAttempts: config.generation.maxAttempts,
    words: options.words,
  });
  const plans = new PlanService({ maxAliasesOnFreePlan: config.aliases.maxAliasesOnFreePlan });
  const aliases = new AliasService({ storage, generator, plans });
  const bindings = new BindingService({
    storage,
    aliases,
    plans,
    disclosurePolicy: config.aliases.disclosurePolicy,
  });
  const users = new UserService({ storage, generator, objectStorage, billing });
  const clients = new ClientService({
    storage,
    generator,
    objectStorage,
    publicUrl: config.server.publicUrl,
  });
  const authorization = new AuthorizationService({
    storage,
    generator,
    bindings,
    users,
    scopePolicy: options.scopePolicy,
    authorizationCodeTtl: config.defaults.authorizationCodeTtl,
    accessTokenTtl: config.defaults.accessTokenTtl,
  });

  return { generator, plans, aliases, bindings, users, clients, authorization };
}
