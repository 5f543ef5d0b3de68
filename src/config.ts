/**
 * Adapter configuration: option defaults and environment variables.
 */

// Copyright 2025 Sushanth (https://github.com/sushanthpy)
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0

import { ConfigError } from './errors';
import { createLogger, isLogLevel, Logger, LogLevel } from './logger';
import { RuleStore } from './store';

export const DEFAULT_DATABASE_NAME = 'casbin';
export const DEFAULT_CONTAINER_NAME = 'casbin_rule';

/** Environment variables read by {@link adapterConfigFromEnv}. */
export const ENV = {
  CONNECTION_STRING: 'CASBIN_COSMOS_CONNECTION_STRING',
  DATABASE: 'CASBIN_COSMOS_DATABASE',
  CONTAINER: 'CASBIN_COSMOS_CONTAINER',
  LOG_LEVEL: 'CASBIN_COSMOS_LOG_LEVEL',
} as const;

/**
 * Options accepted by the adapter factories.
 */
export interface AdapterOptions {
  /** Database holding the rule container (default: "casbin") */
  databaseName?: string;
  /** Container holding the rules (default: "casbin_rule") */
  containerName?: string;
  /** Alias of `containerName`; `containerName` wins when both are set */
  collectionName?: string;
  /** Log destination (default: console at level "info") */
  logger?: Logger;
  /**
   * Use this store instead of creating a Cosmos client from the connection
   * string. It is still provisioned on open.
   */
  store?: RuleStore;
}

export interface ResolvedAdapterConfig {
  databaseName: string;
  containerName: string;
  logger: Logger;
  store?: RuleStore;
}

export function resolveAdapterConfig(options: AdapterOptions = {}): ResolvedAdapterConfig {
  return {
    databaseName: options.databaseName ?? DEFAULT_DATABASE_NAME,
    containerName: options.containerName ?? options.collectionName ?? DEFAULT_CONTAINER_NAME,
    logger: options.logger ?? createLogger(),
    store: options.store,
  };
}

export interface EnvAdapterConfig {
  connectionString: string;
  options: AdapterOptions;
}

/**
 * Read the connection string and options from environment variables.
 *
 * Unset or empty variables fall back to the defaults; the connection string
 * has none.
 *
 * @throws {ConfigError} if the connection string is missing or the log level unknown
 */
export function adapterConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EnvAdapterConfig {
  const connectionString = env[ENV.CONNECTION_STRING];
  if (!connectionString) {
    throw new ConfigError(`${ENV.CONNECTION_STRING} is not set`);
  }

  const rawLevel = (env[ENV.LOG_LEVEL] || 'info').toLowerCase();
  if (!isLogLevel(rawLevel)) {
    throw new ConfigError(`${ENV.LOG_LEVEL} must be one of debug, info, warn, error, silent`);
  }
  const level: LogLevel = rawLevel;

  const options: AdapterOptions = { logger: createLogger(level) };
  if (env[ENV.DATABASE]) options.databaseName = env[ENV.DATABASE];
  if (env[ENV.CONTAINER]) options.containerName = env[ENV.CONTAINER];

  return { connectionString, options };
}
