/**
 * casbin-cosmos-adapter v1.0.0
 *
 * Casbin policy storage in Azure Cosmos DB.
 *
 * Rules live in one container partitioned on `/pType`, one document per
 * rule. The database and container are created on first use.
 *
 * @example
 * ```typescript
 * import { newEnforcer } from 'casbin';
 * import { CosmosAdapter } from 'casbin-cosmos-adapter';
 *
 * const adapter = await CosmosAdapter.newAdapter(connectionString);
 * const enforcer = await newEnforcer('model.conf', adapter);
 * ```
 *
 * @example Filtered loading
 * ```typescript
 * import { Enforcer, newModelFromFile } from 'casbin';
 *
 * const adapter = await CosmosAdapter.newFilteredAdapter(connectionString);
 * const enforcer = new Enforcer();
 * // lazy: skip the full load newEnforcer would do
 * await enforcer.initWithModelAndAdapter(newModelFromFile('model.conf'), adapter, true);
 * await enforcer.loadFilteredPolicy({
 *   query: 'SELECT * FROM root WHERE root.v0 = @v0',
 *   parameters: [{ name: '@v0', value: 'alice' }],
 * });
 * ```
 */

// Version
export const VERSION = '1.0.0';

export { CosmosAdapter } from './adapter';

export { CosmosRuleStore } from './store';
export type { RuleStore, CosmosRuleStoreConfig } from './store';

export {
  DEFAULT_DATABASE_NAME,
  DEFAULT_CONTAINER_NAME,
  ENV,
  adapterConfigFromEnv,
  resolveAdapterConfig,
} from './config';
export type { AdapterOptions, EnvAdapterConfig, ResolvedAdapterConfig } from './config';

export { createLogger, LOG_PREFIX } from './logger';
export type { Logger, LogLevel, LogSink } from './logger';

export {
  MAX_RULE_FIELDS,
  RULE_FIELDS,
  PARTITION_KEY_PATH,
  partitionKeyOf,
  sectionOf,
  toRuleDocument,
  toPolicyTokens,
  buildRuleQuery,
  buildRemoveQuery,
  buildFilteredRemoveQuery,
  toQuerySpec,
} from './rule';
export type { CasbinRule, StoredRule, RuleField } from './rule';

export {
  CosmosAdapterError,
  ConnectionError,
  FilteredPolicyError,
  InvalidFilterError,
  RuleShapeError,
  AdapterClosedError,
  ConfigError,
} from './errors';
