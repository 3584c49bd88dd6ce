import {
  array,
  bigint,
  check,
  integer,
  minValue,
  number,
  pipe,
  regex,
  safeParse,
  string,
  transform,
  union,
} from "valibot";
import type { Felt } from "../types/brands";
import { fail } from "../core/errors";
import { FIELD_PRIME, asFelt } from "../core/felt";

export const feltSchema = pipe(
  union([
    pipe(string(), regex(/^(0x[0-9a-fA-F]+|[0-9]+)$/, "expected hex or decimal")),
    pipe(bigint(), minValue(0n)),
    pipe(
      number(),
      integer(),
      minValue(0),
      check((n) => Number.isSafeInteger(n), "unsafe integer"),
    ),
  ]),
  transform((x) => BigInt(x)),
  check((n) => n < FIELD_PRIME, "value exceeds field modulus"),
  transform<bigint, Felt>(asFelt),
);

export const feltStreamSchema = array(feltSchema);

/** Felts from untyped input (JSON, CLI args, RPC payloads). */
export const parseFelts = (raw: unknown): Felt[] => {
  const res = safeParse(feltStreamSchema, raw);
  if (res.success) return res.output;
  const issue = res.issues[0];
  const at = issue.path?.map((p) => String(p.key)).join(".") ?? "";
  return fail("MalformedStream", `invalid felt${at ? ` at ${at}` : ""}: ${issue.message}`);
};

export const parseFelt = (raw: unknown): Felt => parseFelts([raw])[0];
