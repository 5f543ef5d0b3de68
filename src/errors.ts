/**
 * Cosmos Adapter Error Classes
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

/**
 * Base error class for all adapter errors.
 */
export class CosmosAdapterError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'CosmosAdapterError';
    Object.setPrototypeOf(this, CosmosAdapterError.prototype);
  }
}

/**
 * Error thrown when the Cosmos client cannot be created or the database and
 * container cannot be provisioned.
 */
export class ConnectionError extends CosmosAdapterError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConnectionError';
    Object.setPrototypeOf(this, ConnectionError.prototype);
  }
}

/**
 * Error thrown when saving while the loaded policy is a filtered subset.
 */
export class FilteredPolicyError extends CosmosAdapterError {
  constructor() {
    super('cannot save a filtered policy');
    this.name = 'FilteredPolicyError';
    Object.setPrototypeOf(this, FilteredPolicyError.prototype);
  }
}

/**
 * Error thrown when a filter is neither a query string nor a parameterized query.
 */
export class InvalidFilterError extends CosmosAdapterError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFilterError';
    Object.setPrototypeOf(this, InvalidFilterError.prototype);
  }
}

/**
 * Error thrown when a rule has more values than a document can hold.
 */
export class RuleShapeError extends CosmosAdapterError {
  constructor(ptype: string, length: number, limit: number) {
    super(`Rule of type '${ptype}' has ${length} values, at most ${limit} are supported`);
    this.name = 'RuleShapeError';
    Object.setPrototypeOf(this, RuleShapeError.prototype);
  }
}

/**
 * Error thrown when the adapter is used after close().
 */
export class AdapterClosedError extends CosmosAdapterError {
  constructor() {
    super('Adapter is closed');
    this.name = 'AdapterClosedError';
    Object.setPrototypeOf(this, AdapterClosedError.prototype);
  }
}

/**
 * Error thrown when required configuration is missing or malformed.
 */
export class ConfigError extends CosmosAdapterError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
