import Stripe from 'stripe';

/**
 * Read-only view of the billing provider
 */
export interface IBillingProvider {
  fetchSubscriptionPeriodEnd(subscriptionId: string): Promise<Date>;
}

/**
 * Stripe-backed billing lookups
 */
export class StripeBillingProvider implements IBillingProvider {
  private readonly stripe: Stripe;

  constructor(apiKey: string) {
    this.stripe = new Stripe(apiKey);
  }

  async fetchSubscriptionPeriodEnd(subscriptionId: string): Promise<Date> {
    const subscription = await this.stripe.subscriptions.retrieve(subscriptionId);
    // Stripe timestamps are in seconds
    return new Date(subscription.current_period_end * 1000);
  }
}

/**
 * Used when no Stripe key is configured
 */
export class UnconfiguredBillingProvider implements IBillingProvider {
  async fetchSubscriptionPeriodEnd(subscriptionId: string): Promise<Date> {
    throw new Error(`Billing is not configured; cannot look up subscription ${subscriptionId}`);
  }
}

export function createBillingProvider(apiKey: string | undefined): IBillingProvider {
  return apiKey ? new StripeBillingProvider(apiKey) : new UnconfiguredBillingProvider();
}
