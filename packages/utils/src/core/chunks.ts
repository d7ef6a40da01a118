import { InvalidArgumentError } from "./errors.js"

function* chunkSync<T>(items: Iterable<T>, maxSize: number): Generator<ReadonlyArray<T>> {
  let chunk: Array<T> = []
  for (const item of items) {
    chunk.push(item)
    if (chunk.length === maxSize) {
      yield chunk
      chunk = []
    }
  }
  if (chunk.length > 0) {
    yield chunk
  }
}

async function* chunkAsync<T>(items: AsyncIterable<T>, maxSize: number): AsyncGenerator<ReadonlyArray<T>> {
  let chunk: Array<T> = []
  for await (const item of items) {
    chunk.push(item)
    if (chunk.length === maxSize) {
      yield chunk
      chunk = []
    }
  }
  if (chunk.length > 0) {
    yield chunk
  }
}

const isAsyncIterable = <T>(items: Iterable<T> | AsyncIterable<T>): items is AsyncIterable<T> =>
  typeof items === "object" && items !== null && Symbol.asyncIterator in items

/**
 * Groups an iterable (sync or async) into arrays of at most `maxSize` elements.
 * The last chunk may be shorter.
 *
 * @throws InvalidArgumentError when maxSize is not a positive integer; raised eagerly, before iteration
 * @complexity O(n) time / O(maxSize) space
 */
export function asChunks<T>(items: AsyncIterable<T>, maxSize: number): AsyncIterable<ReadonlyArray<T>>
export function asChunks<T>(items: Iterable<T>, maxSize: number): Iterable<ReadonlyArray<T>>
export function asChunks<T>(
  items: Iterable<T> | AsyncIterable<T>,
  maxSize: number
): Iterable<ReadonlyArray<T>> | AsyncIterable<ReadonlyArray<T>> {
  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new InvalidArgumentError({ message: "Chunk sizes must be greater than 0." })
  }
  return isAsyncIterable(items) ? chunkAsync(items, maxSize) : chunkSync(items, maxSize)
}
