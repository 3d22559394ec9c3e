import { describe, it, expect, beforeEach } from 'vitest';
import { createTestBroker, createTestUser, TEST_REDIRECT_URI, type TestBroker } from '../fixtures.js';
import type { User } from '../../types/user.js';

describe('ClientService', () => {
  let broker: TestBroker;
  let developer: User;

  beforeEach(async () => {
    broker = createTestBroker();
    developer = await createTestUser(broker.services, { email: 'dev@example.com', name: 'Dev' });
  });

  it('derives the client_id from the name and returns the secret once', async () => {
    const { client, clientSecret } = await broker.services.clients.createClient({
      name: 'Demo App',
      ownerId: developer.id,
      redirectUris: [TEST_REDIRECT_URI],
    });

    expect(client.clientId).toMatch(/^demo-app-[a-z]{10}$/);
    expect(clientSecret).toHaveLength(40);
    expect(client.clientSecretHash).not.toBe(clientSecret);
    expect(client.redirectUris).toEqual([TEST_REDIRECT_URI]);
    expect(client.published).toBe(false);
  });

  it('verifies credentials', async () => {
    const { client, clientSecret } = await broker.services.clients.createClient({
      name: 'Demo App',
      ownerId: developer.id,
    });

    await expect(broker.services.clients.verifyCredentials(client.clientId, clientSecret)).resolves.toMatchObject({
      id: client.id,
    });
    await expect(
      broker.services.clients.verifyCredentials(client.clientId, 'test-secret')
    ).rejects.toMatchObject({ code: 'invalid_client', description: 'Invalid client credentials' });
    await expect(broker.services.clients.verifyCredentials('nope', clientSecret)).rejects.toMatchObject({
      code: 'unauthorized_client',
      description: 'Unknown client: nope',
    });
  });

  it('falls back to the default icon', async () => {
    const { client } = await broker.services.clients.createClient({ name: 'Demo App', ownerId: developer.id });
    expect(broker.services.clients.iconUrl(client)).toBe('http://broker.test/static/default-icon.svg');
  });

  it('resolves uploaded icons through object storage', async () => {
    const { client } = await broker.services.clients.createClient({
      name: 'Demo App',
      ownerId: developer.id,
      iconPath: 'icons/demo.png',
    });
    expect(broker.services.clients.iconUrl(client)).toBe('https://cdn.test/icons/demo.png');
  });

  it('adds redirect URIs', async () => {
    const { client } = await broker.services.clients.createClient({
      name: 'Demo App',
      ownerId: developer.id,
      redirectUris: [TEST_REDIRECT_URI],
    });

    const updated = await broker.services.clients.addRedirectUri(client.clientId, 'https://app.test/second');

    expect(updated.redirectUris).toEqual([TEST_REDIRECT_URI, 'https://app.test/second']);
  });
});
