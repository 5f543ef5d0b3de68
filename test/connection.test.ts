/**
 * Tests for opening CosmosAdapter on a Cosmos DB client
 */

import { CosmosClient } from '@azure/cosmos';
import { ConfigError, ConnectionError, CosmosAdapter, createLogger } from '../src';

jest.mock('@azure/cosmos', () => ({
  CosmosClient: jest.fn(),
  PartitionKeyKind: { Hash: 'Hash', MultiHash: 'MultiHash' },
}));

const CONNECTION_STRING = 'AccountEndpoint=https://localhost:8081/;AccountKey=test-secret;';

function mockClient(databaseRead: jest.Mock) {
  const container = { read: jest.fn().mockResolvedValue({}) };
  const database = {
    read: databaseRead,
    container: jest.fn(() => container),
    containers: { create: jest.fn().mockResolvedValue({}) },
  };
  return {
    database: jest.fn(() => database),
    databases: { create: jest.fn().mockResolvedValue({}) },
    dispose: jest.fn(),
  };
}

describe('Opening CosmosAdapter', () => {
  const MockCosmosClient = CosmosClient as unknown as jest.Mock;

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should fail with ConnectionError when the client cannot be created', async () => {
    MockCosmosClient.mockImplementation(() => {
      throw new Error('Invalid connection string');
    });

    const error = await CosmosAdapter.newAdapter('not-a-connection-string', {
      logger: createLogger('silent'),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toHaveProperty(
      'message',
      'Cannot open rule container casbin/casbin_rule: Invalid connection string'
    );
  });

  it('should fail with ConnectionError when the database cannot be read', async () => {
    const unavailable = Object.assign(new Error('Service Unavailable'), { code: 503 });
    MockCosmosClient.mockImplementation(() =>
      mockClient(jest.fn().mockRejectedValue(unavailable))
    );

    const error = await CosmosAdapter.newAdapter(CONNECTION_STRING, {
      logger: createLogger('silent'),
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toHaveProperty('cause', unavailable);
  });

  it('should open from environment variables', async () => {
    const client = mockClient(jest.fn().mockResolvedValue({}));
    MockCosmosClient.mockImplementation(() => client);

    const adapter = await CosmosAdapter.fromEnv({
      CASBIN_COSMOS_CONNECTION_STRING: CONNECTION_STRING,
      CASBIN_COSMOS_DATABASE: 'authz',
      CASBIN_COSMOS_LOG_LEVEL: 'silent',
    });

    expect(MockCosmosClient).toHaveBeenCalledWith(CONNECTION_STRING);
    expect(client.database).toHaveBeenCalledWith('authz');
    expect(adapter.isFiltered()).toBe(false);

    adapter.close();
    expect(client.dispose).toHaveBeenCalledTimes(1);
  });

  it('should refuse to open without a connection string', async () => {
    await expect(CosmosAdapter.fromEnv({})).rejects.toThrow(ConfigError);
    expect(MockCosmosClient).not.toHaveBeenCalled();
  });
});
