import { Option } from "effect"

import { Snowflake } from "./brand.js"
import { ensureSnowflake } from "./snowflake.js"

export type SnowflakeListOptions = {
  readonly isSorted?: boolean | undefined
}

const minimumCapacity = 8

// CHANGE: locate the leftmost insertion point for a value
// WHY: get/has/add share one search over the sorted backing store
// SOURCE: n/a
// FORMAT THEOREM: forall i < result: xs[i] < value ∧ forall i >= result: xs[i] >= value
// PURITY: CORE
// INVARIANT: 0 <= result <= length
// COMPLEXITY: O(log n)/O(1)
const bisectLeft = (data: BigUint64Array, length: number, value: bigint): number => {
  let low = 0
  let high = length
  while (low < high) {
    const mid = (low + high) >>> 1
    const current = data[mid]
    if (current !== undefined && current < value) {
      low = mid + 1
    } else {
      high = mid
    }
  }
  return low
}

/**
 * Ordered store of snowflakes backed by a growable `BigUint64Array`.
 *
 * Lookups are binary searches; `add` shifts the tail of the buffer.
 * Repeated values are kept: both construction and `add` store every value
 * given, so the list behaves as a sorted multiset.
 *
 * @invariant elements are in non-decreasing order
 * @complexity construction O(n log n) (O(n) when isSorted), search O(log n), add O(n)
 */
export class SnowflakeList implements Iterable<Snowflake> {
  private data: BigUint64Array
  private count: number

  constructor(values: Iterable<bigint>, options: SnowflakeListOptions = {}) {
    const checked = Array.from(values, (value) => ensureSnowflake(value))
    const buffer = BigUint64Array.from(checked)
    if (options.isSorted !== true) {
      buffer.sort()
    }
    this.count = buffer.length
    this.data = buffer
  }

  get length(): number {
    return this.count
  }

  add(value: bigint): void {
    const checked = ensureSnowflake(value)
    const index = bisectLeft(this.data, this.count, checked)
    this.reserve(this.count + 1)
    this.data.copyWithin(index + 1, index, this.count)
    this.data[index] = checked
    this.count += 1
  }

  get(value: bigint): Option.Option<Snowflake> {
    return this.has(value) ? Option.some(Snowflake(value)) : Option.none()
  }

  has(value: bigint): boolean {
    if (value < 0n) {
      return false
    }
    const index = bisectLeft(this.data, this.count, value)
    return index < this.count && this.data[index] === value
  }

  includes(value: bigint): boolean {
    return this.has(value)
  }

  at(index: number): Option.Option<Snowflake> {
    const position = index < 0 ? this.count + index : index
    if (!Number.isInteger(position) || position < 0 || position >= this.count) {
      return Option.none()
    }
    return Option.fromNullable(this.data[position]).pipe(Option.map(Snowflake))
  }

  toArray(): ReadonlyArray<Snowflake> {
    return Array.from(this)
  }

  *[Symbol.iterator](): Iterator<Snowflake> {
    for (let i = 0; i < this.count; i += 1) {
      const value = this.data[i]
      if (value !== undefined) {
        yield Snowflake(value)
      }
    }
  }

  private reserve(required: number): void {
    if (required <= this.data.length) {
      return
    }
    const capacity = Math.max(minimumCapacity, this.data.length * 2, required)
    const grown = new BigUint64Array(capacity)
    grown.set(this.data.subarray(0, this.count))
    this.data = grown
  }
}
