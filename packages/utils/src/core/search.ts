import { Option } from "effect"

type Primitive = string | number | bigint | boolean | symbol | null | undefined

type Leaf = Primitive | Date | ReadonlyArray<unknown> | ((...args: ReadonlyArray<never>) => unknown)

// CHANGE: describe attribute queries as nested partial records
// WHY: nested fields are matched by nesting the query instead of encoding paths in key names
// SOURCE: n/a
// FORMAT THEOREM: forall q: AttrQuery<T> ⊆ DeepPartial<T>
// PURITY: CORE
// INVARIANT: leaf values are compared by identity
// COMPLEXITY: O(1)/O(1)
export type AttrQuery<T> = {
  readonly [K in keyof T]?: T[K] extends Leaf ? T[K] : AttrQuery<T[K]> | T[K]
}

const isPlainRecord = (value: unknown): value is object => {
  if (typeof value !== "object" || value === null) {
    return false
  }
  const prototype: unknown = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

const readField = (target: unknown, key: string): unknown =>
  typeof target === "object" && target !== null ? Reflect.get(target, key) : undefined

const matchesQuery = (target: unknown, query: object): boolean =>
  Object.entries(query).every(([key, expected]: [string, unknown]) => {
    const actual = readField(target, key)
    return isPlainRecord(expected) ? matchesQuery(actual, expected) : actual === expected
  })

/**
 * Returns the first element satisfying the predicate, stopping as soon as one is found.
 *
 * @pure true
 * @complexity O(n) time / O(1) space
 */
export function find<T, S extends T>(items: Iterable<T>, refinement: (item: T) => item is S): Option.Option<S>
export function find<T>(items: Iterable<T>, predicate: (item: T) => boolean): Option.Option<T>
export function find<T>(items: Iterable<T>, predicate: (item: T) => boolean): Option.Option<T> {
  for (const item of items) {
    if (predicate(item)) {
      return Option.some(item)
    }
  }
  return Option.none()
}

// CHANGE: find the first element whose attributes equal every entry of the query
// WHY: lookups such as "member named Foo in guild Cool" read as data instead of lambdas
// SOURCE: n/a
// FORMAT THEOREM: forall xs, q: get(xs, q) = find(xs, x -> ∀k ∈ q: x[k] matches q[k])
// PURITY: CORE
// INVARIANT: entries are combined with logical AND; an empty query matches the first element
// COMPLEXITY: O(n·|q|)/O(1)
export const get = <T>(items: Iterable<T>, query: AttrQuery<T>): Option.Option<T> =>
  find(items, (item) => matchesQuery(item, query))

export const unique = <T>(items: Iterable<T>): ReadonlyArray<T> => [...new Set(items)]

// CHANGE: rename or drop keys of a parameter record
// WHY: public option names differ from the payload keys expected downstream
// SOURCE: n/a
// FORMAT THEOREM: forall p, r: k ∈ r ∧ r[k] = null -> k ∉ result; r[k] = n -> result[n] = p[k]
// PURITY: CORE
// INVARIANT: the input record is not mutated
// COMPLEXITY: O(|p| + |r|)/O(|p|)
export const filterParams = (
  params: Readonly<Record<string, unknown>>,
  renames: Readonly<Record<string, string | null>>
): Readonly<Record<string, unknown>> => {
  const result: Record<string, unknown> = { ...params }
  for (const [from, to] of Object.entries(renames)) {
    if (!(from in result)) {
      continue
    }
    const value = result[from]
    delete result[from]
    if (to !== null) {
      result[to] = value
    }
  }
  return result
}
