import type { Felt } from "../types/brands";
import type { AccessState } from "./types";
import { fail } from "./errors";
import { feltToHex } from "./felt";

export const isOwner = (a: AccessState, who: Felt): boolean => a.owner === who;

export const isOperator = (a: AccessState, who: Felt): boolean =>
  a.operators.includes(who);

export const assertOwner = (a: AccessState, caller: Felt): void => {
  if (!isOwner(a, caller))
    fail("Unauthorized", "caller is not the owner", { caller: feltToHex(caller) });
};

export const assertOwnerOrOperator = (a: AccessState, caller: Felt): void => {
  if (!isOwner(a, caller) && !isOperator(a, caller))
    fail("Unauthorized", "caller is not an operator", { caller: feltToHex(caller) });
};

export const registerOperator = (a: AccessState, op: Felt): AccessState =>
  isOperator(a, op) ? a : { ...a, operators: [...a.operators, op] };

export const unregisterOperator = (a: AccessState, op: Felt): AccessState => ({
  ...a,
  operators: a.operators.filter((o) => o !== op),
});

export const transferOwnership = (a: AccessState, next: Felt): AccessState => ({
  ...a,
  owner: next,
});
