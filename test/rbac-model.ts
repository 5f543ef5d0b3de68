import { Model, newModelFromString } from 'casbin';

export const RBAC_MODEL = `
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

export function newRbacModel(): Model {
  return newModelFromString(RBAC_MODEL);
}

/** Sorted copy, for comparing rule sets without caring about order. */
export function sortRules(rules: string[][]): string[][] {
  return rules.map((rule) => [...rule]).sort((a, b) => a.join(',').localeCompare(b.join(',')));
}
