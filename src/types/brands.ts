// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

/** Element of the Stark field, always in `[0, P)`. */
export type Felt = Brand<bigint, "Felt">;
/** A felt widened into the integer domain; the only type magnitudes are compared on. */
export type U256 = Brand<bigint, "U256">;
/** Non-negative length or count that fits a u32. */
export type Index = Brand<number, "Index">;

export const brandFelt = (n: bigint): Felt => n as Felt;
export const brandU256 = (n: bigint): U256 => n as U256;
export const brandIndex = (n: number): Index => n as Index;
