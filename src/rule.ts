/**
 * Rule Documents
 *
 * Conversions between Casbin policy rules and the documents stored in the
 * rule container, plus the parameterized queries used to find them.
 *
 * A rule `p, alice, data1, read` is stored as:
 *
 * ```json
 * { "id": "...", "pType": "p", "v0": "alice", "v1": "data1", "v2": "read" }
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

import type { SqlParameter, SqlQuerySpec } from '@azure/cosmos';
import { InvalidFilterError, RuleShapeError } from './errors';

/** Number of value fields a rule document can hold. */
export const MAX_RULE_FIELDS = 6;

/** Value fields in positional order. */
export const RULE_FIELDS = ['v0', 'v1', 'v2', 'v3', 'v4', 'v5'] as const;

export type RuleField = (typeof RULE_FIELDS)[number];

/** Path of the container's partition key. */
export const PARTITION_KEY_PATH = '/pType';

/**
 * A policy rule as stored in the container. Fields past the rule's length
 * are left out.
 */
export type CasbinRule = {
  id?: string;
  pType: string;
  v0?: string;
  v1?: string;
  v2?: string;
  v3?: string;
  v4?: string;
  v5?: string;
};

/**
 * A rule read back from the container, which always carries its identity.
 */
export type StoredRule = CasbinRule & { id: string };

/**
 * Partition key of a rule with the given policy type.
 */
export function partitionKeyOf(ptype: string): string {
  return ptype;
}

/**
 * Model section of a policy type: `p2` belongs to `p`, `g` to `g`.
 */
export function sectionOf(ptype: string): string {
  return ptype.charAt(0);
}

/**
 * Build the document for a rule.
 *
 * @throws {RuleShapeError} if the rule has more than six values
 */
export function toRuleDocument(ptype: string, rule: readonly string[]): CasbinRule {
  if (rule.length > MAX_RULE_FIELDS) {
    throw new RuleShapeError(ptype, rule.length, MAX_RULE_FIELDS);
  }

  const doc: CasbinRule = { pType: ptype };
  rule.forEach((value, i) => {
    doc[RULE_FIELDS[i]] = value;
  });
  return doc;
}

/**
 * Read a document's values back into a rule. Reading stops at the first
 * missing or empty field.
 */
export function toPolicyTokens(doc: CasbinRule): string[] {
  const tokens: string[] = [];
  for (const field of RULE_FIELDS) {
    const value = doc[field];
    if (!value) {
      break;
    }
    tokens.push(value);
  }
  return tokens;
}

/**
 * Query for the documents of `ptype` whose fields equal the given values.
 * Conditions are joined with AND in the order given.
 */
export function buildRuleQuery(
  ptype: string,
  conditions: ReadonlyArray<[RuleField, string]>
): SqlQuerySpec {
  let query = 'SELECT * FROM root WHERE root.pType = @pType';
  const parameters: SqlParameter[] = [{ name: '@pType', value: ptype }];

  for (const [field, value] of conditions) {
    query += ` AND root.${field} = @${field}`;
    parameters.push({ name: `@${field}`, value });
  }

  return { query, parameters };
}

/**
 * Query matching exactly one rule: one equality per value, starting at `v0`.
 *
 * @throws {RuleShapeError} if the rule has more than six values
 */
export function buildRemoveQuery(ptype: string, rule: readonly string[]): SqlQuerySpec {
  if (rule.length > MAX_RULE_FIELDS) {
    throw new RuleShapeError(ptype, rule.length, MAX_RULE_FIELDS);
  }
  return buildRuleQuery(
    ptype,
    rule.map((value, i): [RuleField, string] => [RULE_FIELDS[i], value])
  );
}

/**
 * Query for `removeFilteredPolicy`: value `fieldValues[k]` constrains field
 * `v(fieldIndex + k)`. Empty values and positions outside `v0..v5` are
 * wildcards.
 */
export function buildFilteredRemoveQuery(
  ptype: string,
  fieldIndex: number,
  fieldValues: readonly string[]
): SqlQuerySpec {
  const conditions: Array<[RuleField, string]> = [];

  RULE_FIELDS.forEach((field, i) => {
    const offset = i - fieldIndex;
    if (offset < 0 || offset >= fieldValues.length) {
      return;
    }
    const value = fieldValues[offset];
    if (value !== '') {
      conditions.push([field, value]);
    }
  });

  return buildRuleQuery(ptype, conditions);
}

function isSqlParameter(value: unknown): value is SqlParameter {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'value' in value
  );
}

function isSqlQuerySpec(value: unknown): value is SqlQuerySpec {
  if (typeof value !== 'object' || value === null || !('query' in value)) {
    return false;
  }
  if (typeof value.query !== 'string') {
    return false;
  }
  if (!('parameters' in value) || value.parameters === undefined) {
    return true;
  }
  return Array.isArray(value.parameters) && value.parameters.every(isSqlParameter);
}

/**
 * Normalize a load filter. `null` and `undefined` mean "no filter"; a string
 * is a query without parameters.
 *
 * @throws {InvalidFilterError} for any other shape
 */
export function toQuerySpec(filter: unknown): SqlQuerySpec | undefined {
  if (filter === undefined || filter === null) {
    return undefined;
  }
  if (typeof filter === 'string') {
    return { query: filter };
  }
  if (isSqlQuerySpec(filter)) {
    return filter;
  }
  throw new InvalidFilterError(
    'Filter must be a query string or a { query, parameters } query spec'
  );
}
