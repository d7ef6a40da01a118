// CHANGE: introduce branded identifiers for platform-assigned ids
// WHY: keep snowflakes distinct from arbitrary bigints without unsafe casts at call sites
// SOURCE: n/a
// FORMAT THEOREM: forall x in IdDomain: brand(x) -> preserves(value(x))
// PURITY: CORE
// INVARIANT: brands are only created in this axiomatic module
// COMPLEXITY: O(1)/O(1)
export type Brand<T, Name extends string> = T & { readonly __brand: Name }

export type Snowflake = Brand<bigint, "Snowflake">
export type UnixSeconds = Brand<number, "UnixSeconds">

// CHANGE: provide the snowflake constructor at the boundary
// WHY: ids are branded only after range validation in snowflake.ts
// SOURCE: n/a
// FORMAT THEOREM: forall n in [0, 2^64): Snowflake(n) = n ∧ type(Snowflake(n)) = Snowflake
// PURITY: CORE
// INVARIANT: branding does not change runtime representation
// COMPLEXITY: O(1)/O(1)
export const Snowflake = (value: bigint): Snowflake => value as Snowflake

// CHANGE: provide a constructor for unix timestamps expressed in seconds
// WHY: timestamp markup counts seconds while Date counts milliseconds
// SOURCE: n/a
// FORMAT THEOREM: forall n in Number: UnixSeconds(n) = n
// PURITY: CORE
// INVARIANT: seconds value stays unchanged
// COMPLEXITY: O(1)/O(1)
export const UnixSeconds = (value: number): UnixSeconds => value as UnixSeconds
