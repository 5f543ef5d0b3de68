/**
 * Rule Store
 *
 * Document operations the adapter needs, and their Cosmos DB implementation.
 * This is the only module that talks to `@azure/cosmos`.
 *
 * @packageDocumentation
 */

// Copyright 2025 Sushanth (https://github.com/sushanthpy)
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0

import { CosmosClient, PartitionKeyKind } from '@azure/cosmos';
import type {
  Container,
  ContainerRequest,
  Database,
  FeedOptions,
  QueryIterator,
  SqlQuerySpec,
} from '@azure/cosmos';
import { Logger } from './logger';
import { CasbinRule, PARTITION_KEY_PATH, StoredRule } from './rule';

/**
 * Document store holding the rules.
 *
 * Reads come back page by page; every other call is a single request.
 */
export interface RuleStore {
  /** Create the database and container if they are missing. */
  provision(): Promise<void>;
  /** Every document, across all partitions. */
  readAll(): AsyncIterable<StoredRule[]>;
  /** Documents matching `spec`; all partitions unless `partitionKey` is given. */
  query(spec: SqlQuerySpec, partitionKey?: string): AsyncIterable<StoredRule[]>;
  create(doc: CasbinRule): Promise<void>;
  delete(id: string, partitionKey: string): Promise<void>;
  /** Drop the container and create it again, empty. */
  reset(): Promise<void>;
  dispose(): void;
}

export interface CosmosRuleStoreConfig {
  databaseName: string;
  containerName: string;
  logger: Logger;
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 404
  );
}

/**
 * Rule store backed by a Cosmos DB SQL API container partitioned on `/pType`.
 *
 * @example
 * ```typescript
 * const store = CosmosRuleStore.fromConnectionString(
 *   'AccountEndpoint=https://localhost:8081/;AccountKey=test-secret;',
 *   { databaseName: 'casbin', containerName: 'casbin_rule', logger: createLogger() }
 * );
 * await store.provision();
 * ```
 */
export class CosmosRuleStore implements RuleStore {
  private _client: CosmosClient;
  private _config: CosmosRuleStoreConfig;

  constructor(client: CosmosClient, config: CosmosRuleStoreConfig) {
    this._client = client;
    this._config = config;
  }

  static fromConnectionString(
    connectionString: string,
    config: CosmosRuleStoreConfig
  ): CosmosRuleStore {
    return new CosmosRuleStore(new CosmosClient(connectionString), config);
  }

  private get _database(): Database {
    return this._client.database(this._config.databaseName);
  }

  private get _container(): Container {
    return this._database.container(this._config.containerName);
  }

  private _containerDefinition(): ContainerRequest {
    return {
      id: this._config.containerName,
      partitionKey: { paths: [PARTITION_KEY_PATH], kind: PartitionKeyKind.Hash },
    };
  }

  async provision(): Promise<void> {
    const { databaseName, containerName, logger } = this._config;

    try {
      await this._database.read();
    } catch (error) {
      if (!isNotFound(error)) throw error;
      logger.info(`Creating database ${databaseName}`);
      await this._client.databases.create({ id: databaseName });
    }

    try {
      await this._container.read();
    } catch (error) {
      if (!isNotFound(error)) throw error;
      logger.info(`Creating container ${databaseName}/${containerName}`);
      await this._database.containers.create(this._containerDefinition());
    }
  }

  readAll(): AsyncIterable<StoredRule[]> {
    return this._pages(this._container.items.readAll<StoredRule>());
  }

  query(spec: SqlQuerySpec, partitionKey?: string): AsyncIterable<StoredRule[]> {
    const options: FeedOptions = partitionKey === undefined ? {} : { partitionKey };
    return this._pages(this._container.items.query<StoredRule>(spec, options));
  }

  async create(doc: CasbinRule): Promise<void> {
    await this._container.items.create(doc);
  }

  async delete(id: string, partitionKey: string): Promise<void> {
    await this._container.item(id, partitionKey).delete();
  }

  async reset(): Promise<void> {
    await this._container.delete();
    await this._database.containers.create(this._containerDefinition());
  }

  dispose(): void {
    this._client.dispose();
  }

  /**
   * Drain a query iterator one page at a time. The iterator carries the
   * continuation token between pages.
   */
  private async *_pages<T extends StoredRule>(
    iterator: QueryIterator<T>
  ): AsyncGenerator<StoredRule[]> {
    while (iterator.hasMoreResults()) {
      const response = await iterator.fetchNext();
      yield response.resources;
    }
  }
}
