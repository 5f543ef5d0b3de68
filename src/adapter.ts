/**
 * Cosmos DB Policy Adapter
 *
 * Loads and saves Casbin policy rules in a Cosmos DB container partitioned
 * by policy type.
 *
 * @example
 * ```typescript
 * import { newEnforcer } from 'casbin';
 * import { CosmosAdapter } from 'casbin-cosmos-adapter';
 *
 * const adapter = await CosmosAdapter.newAdapter(process.env.COSMOS_CONNECTION_STRING ?? '', {
 *   databaseName: 'casbin',
 *   containerName: 'casbin_rule',
 * });
 * const enforcer = await newEnforcer('model.conf', adapter);
 *
 * await enforcer.addPolicy('alice', 'data1', 'read');
 * await enforcer.enforce('alice', 'data1', 'read'); // true
 * ```
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

import type { SqlQuerySpec } from '@azure/cosmos';
import type { BatchAdapter, FilteredAdapter, Model } from 'casbin';
import { v4 as uuidv4 } from 'uuid';
import { AdapterOptions, adapterConfigFromEnv, resolveAdapterConfig } from './config';
import {
  AdapterClosedError,
  ConnectionError,
  FilteredPolicyError,
} from './errors';
import { Logger } from './logger';
import {
  buildFilteredRemoveQuery,
  buildRemoveQuery,
  CasbinRule,
  partitionKeyOf,
  sectionOf,
  StoredRule,
  toPolicyTokens,
  toQuerySpec,
  toRuleDocument,
} from './rule';
import { CosmosRuleStore, RuleStore } from './store';

/** Sections written by savePolicy, in order. */
const SAVED_SECTIONS = ['p', 'g'] as const;

/**
 * Casbin adapter storing rules in Cosmos DB.
 *
 * Holds no rules between calls. The only state is whether the last load was
 * filtered, which blocks {@link CosmosAdapter.savePolicy}.
 */
export class CosmosAdapter implements FilteredAdapter, BatchAdapter {
  private _store: RuleStore;
  private _logger: Logger;
  private _filtered: boolean;
  private _closed = false;

  private constructor(store: RuleStore, logger: Logger, filtered: boolean) {
    this._store = store;
    this._logger = logger;
    this._filtered = filtered;
  }

  /**
   * Connect and make sure the database and container exist, creating them
   * when missing.
   *
   * @param connectionString - Cosmos DB connection string
   * @param options - Database and container names, logger, or a prebuilt store
   * @throws {ConnectionError} if the client cannot be created or provisioning fails
   */
  static async newAdapter(
    connectionString: string,
    options: AdapterOptions = {}
  ): Promise<CosmosAdapter> {
    return CosmosAdapter._open(connectionString, options, false);
  }

  /**
   * Same as {@link CosmosAdapter.newAdapter}, but the adapter starts out
   * filtered, so {@link CosmosAdapter.savePolicy} is refused until a full
   * load. `newEnforcer(model, adapter)` still loads every rule; initialize
   * the enforcer lazily and call `loadFilteredPolicy` on it instead.
   *
   * @example
   * ```typescript
   * const adapter = await CosmosAdapter.newFilteredAdapter(connectionString);
   * const enforcer = new Enforcer();
   * await enforcer.initWithModelAndAdapter(newModelFromString(text), adapter, true);
   * await enforcer.loadFilteredPolicy({ query: 'SELECT * FROM root WHERE root.v0 = @v0', parameters });
   * ```
   */
  static async newFilteredAdapter(
    connectionString: string,
    options: AdapterOptions = {}
  ): Promise<CosmosAdapter> {
    return CosmosAdapter._open(connectionString, options, true);
  }

  /**
   * Build an adapter from `CASBIN_COSMOS_*` environment variables.
   */
  static async fromEnv(env: NodeJS.ProcessEnv = process.env): Promise<CosmosAdapter> {
    const { connectionString, options } = adapterConfigFromEnv(env);
    return CosmosAdapter.newAdapter(connectionString, options);
  }

  private static async _open(
    connectionString: string,
    options: AdapterOptions,
    filtered: boolean
  ): Promise<CosmosAdapter> {
    const config = resolveAdapterConfig(options);
    const target = `${config.databaseName}/${config.containerName}`;

    let store: RuleStore;
    try {
      store = config.store ?? CosmosRuleStore.fromConnectionString(connectionString, config);
      await store.provision();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      config.logger.error(`Opening ${target} failed: ${reason}`);
      throw new ConnectionError(`Cannot open rule container ${target}: ${reason}`, error);
    }

    config.logger.info(`Using rule container ${target}`);
    return new CosmosAdapter(store, config.logger, filtered);
  }

  /**
   * Load every rule into the model.
   */
  async loadPolicy(model: Model): Promise<void> {
    return this.loadFilteredPolicy(model, undefined);
  }

  /**
   * Load the rules selected by a Cosmos SQL query.
   *
   * @param filter - A query string or `{ query, parameters }` spec, e.g.
   *   `{ query: 'SELECT * FROM root WHERE root.v0 = @v0', parameters: [{ name: '@v0', value: 'alice' }] }`.
   *   `null` or `undefined` loads everything.
   * @throws {InvalidFilterError} if the filter has another shape
   */
  async loadFilteredPolicy(model: Model, filter: unknown): Promise<void> {
    this._ensureOpen();
    const spec = toQuerySpec(filter);
    this._filtered = spec !== undefined;

    const pages = spec === undefined ? this._store.readAll() : this._store.query(spec);
    const docs: StoredRule[] = [];
    for await (const page of pages) {
      docs.push(...page);
    }

    let loaded = 0;
    for (const doc of docs) {
      if (this._loadRule(doc, model)) loaded++;
    }
    this._logger.debug(`Loaded ${loaded} of ${docs.length} rules${this._filtered ? ' (filtered)' : ''}`);
  }

  isFiltered(): boolean {
    return this._filtered;
  }

  /**
   * Replace the stored rules with the model's `p` and `g` sections.
   *
   * The container is dropped and recreated first, so readers may briefly
   * see no rules. The first failed insert ends the save; rules inserted
   * before it stay.
   *
   * @throws {FilteredPolicyError} if the last load was filtered
   */
  async savePolicy(model: Model): Promise<boolean> {
    this._ensureOpen();
    if (this._filtered) {
      throw new FilteredPolicyError();
    }

    const docs: CasbinRule[] = [];
    for (const sec of SAVED_SECTIONS) {
      const assertions = model.model.get(sec);
      if (!assertions) continue;
      for (const [ptype, assertion] of assertions) {
        for (const rule of assertion.policy) {
          docs.push(toRuleDocument(ptype, rule));
        }
      }
    }

    await this._store.reset();
    for (const doc of docs) {
      await this._insert(doc);
    }

    this._logger.info(`Saved ${docs.length} rules`);
    return true;
  }

  async addPolicy(sec: string, ptype: string, rule: string[]): Promise<void> {
    this._ensureOpen();
    await this._insert(toRuleDocument(ptype, rule));
  }

  async addPolicies(sec: string, ptype: string, rules: string[][]): Promise<void> {
    this._ensureOpen();
    const docs = rules.map((rule) => toRuleDocument(ptype, rule));
    for (const doc of docs) {
      await this._insert(doc);
    }
  }

  /**
   * Delete every stored copy of a rule.
   */
  async removePolicy(sec: string, ptype: string, rule: string[]): Promise<void> {
    this._ensureOpen();
    await this._deleteMatching(ptype, buildRemoveQuery(ptype, rule));
  }

  async removePolicies(sec: string, ptype: string, rules: string[][]): Promise<void> {
    this._ensureOpen();
    const queries = rules.map((rule) => buildRemoveQuery(ptype, rule));
    for (const query of queries) {
      await this._deleteMatching(ptype, query);
    }
  }

  /**
   * Delete the rules of `ptype` whose values from position `fieldIndex` on
   * equal `fieldValues`. Empty strings match anything.
   *
   * @example
   * ```typescript
   * // every rule granting anything on data1
   * await adapter.removeFilteredPolicy('p', 'p', 1, 'data1');
   * ```
   */
  async removeFilteredPolicy(
    sec: string,
    ptype: string,
    fieldIndex: number,
    ...fieldValues: string[]
  ): Promise<void> {
    this._ensureOpen();
    await this._deleteMatching(ptype, buildFilteredRemoveQuery(ptype, fieldIndex, fieldValues));
  }

  /**
   * Release the Cosmos client. Later calls reject with AdapterClosedError.
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    this._store.dispose();
  }

  private _loadRule(doc: StoredRule, model: Model): boolean {
    const ptype = typeof doc.pType === 'string' ? doc.pType : '';
    const sec = sectionOf(ptype);
    if (!ptype || !model.model.get(sec)?.has(ptype)) {
      this._logger.warn(`Skipping rule ${doc.id}: policy type '${ptype}' is not in the model`);
      return false;
    }
    return model.addPolicy(sec, ptype, toPolicyTokens(doc));
  }

  private async _insert(doc: CasbinRule): Promise<void> {
    await this._store.create({ id: uuidv4(), ...doc });
  }

  /**
   * Fetch all matches first, then delete them one by one in their own
   * partitions. The first failed delete stops the rest.
   */
  private async _deleteMatching(ptype: string, spec: SqlQuerySpec): Promise<void> {
    const matches: StoredRule[] = [];
    for await (const page of this._store.query(spec, partitionKeyOf(ptype))) {
      matches.push(...page);
    }

    for (const doc of matches) {
      await this._store.delete(doc.id, partitionKeyOf(doc.pType));
    }
    this._logger.debug(`Removed ${matches.length} rules of type '${ptype}'`);
  }

  private _ensureOpen(): void {
    if (this._closed) {
      throw new AdapterClosedError();
    }
  }
}
