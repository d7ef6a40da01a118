import { describe, expect, it } from "@effect/vitest"
import { Effect, Fiber, Option, Ref, TestClock } from "effect"

import { asyncAll, type CachedSource, delayTask, getOrFetch, saneWaitFor } from "../../src/shell/tasks.js"

type Role = {
  readonly id: number
  readonly name: string
}

const makeSource = (
  cached: ReadonlyArray<Role>,
  remote: ReadonlyArray<Role>
) => {
  const fetched: Array<number> = []
  const source: CachedSource<number, Role, string, never> = {
    name: "role",
    get: (id) => Option.fromNullable(cached.find((role) => role.id === id)),
    fetch: (id) =>
      Effect.suspend((): Effect.Effect<Option.Option<Role>, string> => {
        fetched.push(id)
        return id < 0
          ? Effect.fail("upstream unavailable")
          : Effect.succeed(Option.fromNullable(remote.find((role) => role.id === id)))
      })
  }
  return { fetched, source }
}

describe("getOrFetch", () => {
  it.effect("serves cached values without fetching", () =>
    Effect.gen(function*(_) {
      const { fetched, source } = makeSource([{ id: 1, name: "admin" }], [])
      const role = yield* _(getOrFetch(source, 1))
      expect(role.name).toBe("admin")
      expect(fetched).toEqual([])
    }))

  it.effect("fetches on a cache miss", () =>
    Effect.gen(function*(_) {
      const { fetched, source } = makeSource([], [{ id: 2, name: "mod" }])
      const role = yield* _(getOrFetch(source, 2))
      expect(role.name).toBe("mod")
      expect(fetched).toEqual([2])
    }))

  it.effect("fails with NotFoundError when the entity is missing", () =>
    Effect.gen(function*(_) {
      const { source } = makeSource([], [])
      const error = yield* _(Effect.flip(getOrFetch(source, 7)))
      expect(error).toMatchObject({ _tag: "NotFoundError", message: "Could not find role with id 7" })
    }))

  it.effect("propagates fetch failures without a default", () =>
    Effect.gen(function*(_) {
      const { source } = makeSource([], [])
      const error = yield* _(Effect.flip(getOrFetch(source, -1)))
      expect(error).toBe("upstream unavailable")
    }))

  it.effect("falls back to the default on any failure", () =>
    Effect.gen(function*(_) {
      const { source } = makeSource([], [])
      const missing = yield* _(getOrFetch(source, 7, { default: null }))
      const failed = yield* _(getOrFetch(source, -1, { default: null }))
      expect(missing).toBeNull()
      expect(failed).toBeNull()
    }))
})

describe("delayTask", () => {
  it.effect("runs the task after the delay", () =>
    Effect.gen(function*(_) {
      const counter = yield* _(Ref.make(0))
      const fiber = yield* _(delayTask("1 second", Ref.update(counter, (n) => n + 1)))
      expect(yield* _(Ref.get(counter))).toBe(0)
      yield* _(TestClock.adjust("1 second"))
      yield* _(Fiber.join(fiber))
      expect(yield* _(Ref.get(counter))).toBe(1)
    }))

  it.effect("keeps a failing task away from the caller", () =>
    Effect.gen(function*(_) {
      const fiber = yield* _(delayTask("1 second", Effect.fail("boom")))
      yield* _(TestClock.adjust("1 second"))
      const exit = yield* _(Fiber.await(fiber))
      expect(exit._tag).toBe("Success")
    }))
})

describe("saneWaitFor", () => {
  it.effect("collects results in order", () =>
    Effect.gen(function*(_) {
      const results = yield* _(saneWaitFor([Effect.succeed(1), Effect.succeed(2)], "1 second"))
      expect(results).toEqual([1, 2])
    }))

  it.effect("fails with TaskTimeoutError when a task is still pending", () =>
    Effect.gen(function*(_) {
      const fiber = yield* _(Effect.fork(Effect.flip(saneWaitFor([Effect.succeed(1), Effect.never], "1 second"))))
      yield* _(TestClock.adjust("1 second"))
      const error = yield* _(Fiber.join(fiber))
      expect(error._tag).toBe("TaskTimeoutError")
    }))
})

describe("asyncAll", () => {
  it.effect("is true when every check passes", () =>
    Effect.gen(function*(_) {
      expect(yield* _(asyncAll([true, Effect.succeed(true)]))).toBe(true)
      expect(yield* _(asyncAll<never, never>([]))).toBe(true)
    }))

  it.effect("stops at the first failing check", () =>
    Effect.gen(function*(_) {
      const reached = yield* _(Ref.make(false))
      const result = yield* _(asyncAll([Effect.succeed(true), false, Ref.set(reached, true).pipe(Effect.as(true))]))
      expect(result).toBe(false)
      expect(yield* _(Ref.get(reached))).toBe(false)
    }))
})
