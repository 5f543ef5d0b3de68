/**
 * Scenario tests: a Casbin enforcer backed by CosmosAdapter
 */

import { Enforcer, newEnforcer } from 'casbin';
import { CosmosAdapter, createLogger } from '../src';
import { MemoryRuleStore } from './memory-rule-store';
import { newRbacModel } from './rbac-model';

describe('Enforcer with CosmosAdapter', () => {
  let store: MemoryRuleStore;

  const options = () => ({ store, logger: createLogger('silent') });

  beforeEach(async () => {
    store = new MemoryRuleStore(2);
    const adapter = await CosmosAdapter.newAdapter('', options());
    const model = newRbacModel();
    model.addPolicy('p', 'p', ['alice', 'data1', 'read']);
    model.addPolicy('p', 'p', ['bob', 'data2', 'write']);
    model.addPolicy('g', 'g', ['alice', 'admin']);
    await adapter.savePolicy(model);
  });

  it('should load the saved rules and enforce them', async () => {
    const adapter = await CosmosAdapter.newAdapter('', options());
    const enforcer = await newEnforcer(newRbacModel(), adapter);

    expect(await enforcer.getPolicy()).toEqual([
      ['alice', 'data1', 'read'],
      ['bob', 'data2', 'write'],
    ]);
    expect(await enforcer.getGroupingPolicy()).toEqual([['alice', 'admin']]);
    expect(await enforcer.enforce('alice', 'data1', 'read')).toBe(true);
    expect(await enforcer.enforce('bob', 'data2', 'write')).toBe(true);
    expect(await enforcer.enforce('bob', 'data1', 'read')).toBe(false);
  });

  it('should load only the filtered subset', async () => {
    const adapter = await CosmosAdapter.newFilteredAdapter('', options());
    const enforcer = new Enforcer();
    await enforcer.initWithModelAndAdapter(newRbacModel(), adapter, true);

    expect(store.calls).not.toContain('readAll');
    expect(adapter.isFiltered()).toBe(true);
    expect(await enforcer.getPolicy()).toEqual([]);

    await enforcer.loadFilteredPolicy({
      query: 'SELECT * FROM root WHERE root.v0 = @v0',
      parameters: [{ name: '@v0', value: 'alice' }],
    });

    expect(adapter.isFiltered()).toBe(true);
    expect(await enforcer.getPolicy()).toEqual([['alice', 'data1', 'read']]);
    expect(await enforcer.getGroupingPolicy()).toEqual([['alice', 'admin']]);
    expect(await enforcer.enforce('bob', 'data2', 'write')).toBe(false);
    await expect(adapter.savePolicy(enforcer.getModel())).rejects.toThrow(
      'cannot save a filtered policy'
    );
  });

  it('should write incremental changes through to the store', async () => {
    const adapter = await CosmosAdapter.newAdapter('', options());
    const enforcer = await newEnforcer(newRbacModel(), adapter);

    await enforcer.addPolicy('carol', 'data3', 'read');
    await enforcer.removePolicy('bob', 'data2', 'write');

    expect(
      store.documents.map(({ pType, v0, v1, v2 }) => [pType, v0, v1, v2].filter(Boolean).join(', '))
    ).toEqual(['p, alice, data1, read', 'g, alice, admin', 'p, carol, data3, read']);
  });
});
