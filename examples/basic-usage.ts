/**
 * Example: RBAC enforcement with rules stored in Cosmos DB
 *
 * Run against the emulator or an account by setting
 * CASBIN_COSMOS_CONNECTION_STRING.
 */

import { newEnforcer, newModelFromString } from 'casbin';
import { CosmosAdapter } from '../src/index';

const MODEL = `
[request_definition]
r = sub, obj, act

[policy_definition]
p = sub, obj, act

[role_definition]
g = _, _

[policy_effect]
e = some(where (p.eft == allow))

[matchers]
m = g(r.sub, p.sub) && r.obj == p.obj && r.act == p.act
`;

async function main() {
    console.log('=== Casbin + Cosmos DB ===\n');

    const adapter = await CosmosAdapter.fromEnv();

    try {
        const enforcer = await newEnforcer(newModelFromString(MODEL), adapter);

        console.log('1. Adding rules:');
        await enforcer.addPolicy('admin', 'data1', 'write');
        await enforcer.addPolicy('alice', 'data1', 'read');
        await enforcer.addGroupingPolicy('alice', 'admin');
        console.log(`  policies: ${JSON.stringify(await enforcer.getPolicy())}`);

        console.log('\n2. Enforcing:');
        for (const [sub, obj, act] of [
            ['alice', 'data1', 'read'],
            ['alice', 'data1', 'write'],
            ['bob', 'data1', 'read'],
        ]) {
            console.log(`  ${sub} ${act} ${obj}: ${await enforcer.enforce(sub, obj, act)}`);
        }

        console.log('\n3. Filtered load:');
        await enforcer.loadFilteredPolicy({
            query: 'SELECT * FROM root WHERE root.v0 = @v0',
            parameters: [{ name: '@v0', value: 'alice' }],
        });
        console.log(`  policies: ${JSON.stringify(await enforcer.getPolicy())}`);
        console.log(`  filtered: ${adapter.isFiltered()}`);

        console.log('\n4. Cleanup:');
        await enforcer.loadPolicy();
        await enforcer.removeFilteredPolicy(0, 'alice');
        await enforcer.removeGroupingPolicy('alice', 'admin');
        await enforcer.removePolicy('admin', 'data1', 'write');
        console.log(`  policies: ${JSON.stringify(await enforcer.getPolicy())}`);
    } finally {
        adapter.close();
        console.log('\nAdapter closed.');
    }
}

main().catch(err => {
    console.error('Error:', err);
    process.exit(1);
});
