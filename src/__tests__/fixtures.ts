import { loadConfig, type Config } from '../config/index.js';
import { createMemoryStorage } from '../storage/memory/index.js';
import type { IStorage } from '../storage/interfaces/index.js';
import type { IBillingProvider } from '../integrations/billing.js';
import { PublicBucketStorage } from '../integrations/object-storage.js';
import { createBrokerServices, type BrokerServices, type ScopeGrantPolicy } from '../services/index.js';
import type { User } from '../types/user.js';
import type { PlanState } from '../types/plan.js';
import type { RegisteredClient } from '../types/client.js';

export const TEST_EMAIL_DOMAIN = 'sl.test';
export const TEST_PUBLIC_URL = 'http://broker.test';
export const TEST_REDIRECT_URI = 'https://app.test/callback';

/**
 * Configuration with fixed values, independent of the environment
 */
export function testConfig(aliases: Partial<Config['aliases']> = {}): Config {
  const base = loadConfig();
  return {
    ...base,
    server: { ...base.server, nodeEnv: 'test', publicUrl: TEST_PUBLIC_URL },
    database: { path: undefined },
    secrets: { stripeApiKey: undefined },
    logging: { level: 'silent' },
    aliases: {
      emailDomain: TEST_EMAIL_DOMAIN,
      maxAliasesOnFreePlan: 3,
      disclosurePolicy: 'always_alias',
      ...aliases,
    },
    generation: { maxAttempts: 10 },
    objectStorage: { baseUrl: 'https://cdn.test/' },
    defaults: { accessTokenTtl: 3600, authorizationCodeTtl: 600 },
  };
}

/**
 * Billing provider answering from a fixed table
 */
export class FakeBillingProvider implements IBillingProvider {
  readonly periodEnds = new Map<string, Date>();

  async fetchSubscriptionPeriodEnd(subscriptionId: string): Promise<Date> {
    const end = this.periodEnds.get(subscriptionId);
    if (!end) {
      throw new Error(`No such subscription: ${subscriptionId}`);
    }
    return end;
  }
}

export interface TestBroker {
  storage: IStorage;
  services: BrokerServices;
  billing: FakeBillingProvider;
  config: Config;
}

export function createTestBroker(
  options: {
    storage?: IStorage;
    aliases?: Partial<Config['aliases']>;
    scopePolicy?: ScopeGrantPolicy;
  } = {}
): TestBroker {
  const storage = options.storage ?? createMemoryStorage();
  const config = testConfig(options.aliases);
  const billing = new FakeBillingProvider();
  const services = createBrokerServices(storage, {
    config,
    billing,
    objectStorage: new PublicBucketStorage('https://cdn.test/'),
    scopePolicy: options.scopePolicy,
  });

  return { storage, services, billing, config };
}

export async function createTestUser(
  services: BrokerServices,
  input: { email?: string; name?: string; plan?: PlanState; profilePicturePath?: string } = {}
): Promise<User> {
  return services.users.register({
    email: input.email ?? 'ada@example.com',
    name: input.name ?? 'Ada Lovelace',
    plan: input.plan,
    profilePicturePath: input.profilePicturePath,
    activated: true,
  });
}

export async function createTestClient(
  services: BrokerServices,
  owner: User,
  name = 'Demo App'
): Promise<RegisteredClient> {
  return services.clients.createClient({
    name,
    ownerId: owner.id,
    redirectUris: [TEST_REDIRECT_URI],
  });
}
