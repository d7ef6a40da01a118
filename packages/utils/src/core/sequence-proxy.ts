import { Array as Arr, Option } from "effect"

/**
 * Read-only view over an array owned elsewhere.
 *
 * Writes to the underlying array are visible through the proxy; the proxy
 * itself exposes no mutators.
 */
export class SequenceProxy<T> implements Iterable<T> {
  constructor(private readonly proxied: ReadonlyArray<T>) {}

  get length(): number {
    return this.proxied.length
  }

  at(index: number): Option.Option<T> {
    const position = index < 0 ? this.proxied.length + index : index
    return Arr.get(this.proxied, position)
  }

  includes(value: T): boolean {
    return this.proxied.includes(value)
  }

  indexOf(value: T, start = 0, end = this.proxied.length): Option.Option<number> {
    const index = this.proxied.slice(0, end).indexOf(value, start)
    return index === -1 ? Option.none() : Option.some(index)
  }

  count(value: T): number {
    return this.proxied.filter((item) => item === value).length
  }

  reversed(): ReadonlyArray<T> {
    return [...this.proxied].reverse()
  }

  [Symbol.iterator](): Iterator<T> {
    return this.proxied[Symbol.iterator]()
  }
}
