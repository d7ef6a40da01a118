import { Data, Duration, Effect, type Fiber, Option, pipe } from "effect"

export class NotFoundError extends Data.TaggedError("NotFoundError")<{
  readonly message: string
}> {}

export class TaskTimeoutError extends Data.TaggedError("TaskTimeoutError")<{
  readonly message: string
}> {}

export type CachedSource<Id, A, E, R> = {
  readonly name: string
  readonly get: (id: Id) => Option.Option<A>
  readonly fetch: (id: Id) => Effect.Effect<Option.Option<A>, E, R>
}

export type GetOrFetchOptions<B> = {
  readonly default: B
}

const lookup = <Id, A, E, R>(
  source: CachedSource<Id, A, E, R>,
  id: Id
): Effect.Effect<A, E | NotFoundError, R> =>
  Effect.gen(function*(_) {
    const cached = source.get(id)
    if (Option.isSome(cached)) {
      return cached.value
    }
    const fetched = yield* _(source.fetch(id))
    if (Option.isNone(fetched)) {
      return yield* _(Effect.fail(new NotFoundError({ message: `Could not find ${source.name} with id ${String(id)}` })))
    }
    return fetched.value
  })

/**
 * Reads an entity from the local cache, fetching it when absent.
 *
 * With a `default`, any fetch failure (including a missing entity) yields the
 * default instead; the failure is logged at debug level.
 */
export function getOrFetch<Id, A, E, R>(
  source: CachedSource<Id, A, E, R>,
  id: Id
): Effect.Effect<A, E | NotFoundError, R>
export function getOrFetch<Id, A, E, R, B>(
  source: CachedSource<Id, A, E, R>,
  id: Id,
  options: GetOrFetchOptions<B>
): Effect.Effect<A | B, never, R>
export function getOrFetch<Id, A, E, R, B>(
  source: CachedSource<Id, A, E, R>,
  id: Id,
  options?: GetOrFetchOptions<B>
): Effect.Effect<A | B, E | NotFoundError, R> {
  if (options === undefined) {
    return lookup(source, id)
  }
  const fallback = options.default
  return pipe(
    lookup(source, id),
    Effect.catchAll((error) =>
      pipe(
        Effect.logDebug(`Falling back to default ${source.name} for id ${String(id)}`, error),
        Effect.as(fallback)
      )
    )
  )
}

// CHANGE: run an effect in the background after a delay
// WHY: follow-up actions (such as deleting a message later) must not block the caller
// SOURCE: n/a
// FORMAT THEOREM: forall d, t: delayTask(d, t) returns before t starts
// PURITY: SHELL
// EFFECT: Effect<RuntimeFiber<void>, never, R>
// INVARIANT: a failing task is logged at warning level, never propagated to the caller
// COMPLEXITY: O(1)/O(1)
export const delayTask = <A, E, R>(
  delay: Duration.DurationInput,
  task: Effect.Effect<A, E, R>
): Effect.Effect<Fiber.RuntimeFiber<void>, never, R> =>
  pipe(
    Effect.sleep(delay),
    Effect.zipRight(task),
    Effect.asVoid,
    Effect.catchAllCause((cause) => Effect.logWarning("Delayed task failed", cause)),
    Effect.forkDaemon
  )

/**
 * Runs every task concurrently and fails with `TaskTimeoutError` if any is
 * still running after `timeout`; unfinished tasks are interrupted.
 */
export const saneWaitFor = <A, E, R>(
  tasks: Iterable<Effect.Effect<A, E, R>>,
  timeout: Duration.DurationInput
): Effect.Effect<ReadonlyArray<A>, E | TaskTimeoutError, R> =>
  pipe(
    Effect.all(Array.from(tasks), { concurrency: "unbounded" }),
    Effect.timeoutFail({
      duration: timeout,
      onTimeout: () =>
        new TaskTimeoutError({
          message: `Tasks still pending after ${Duration.format(Duration.decode(timeout))}`
        })
    })
  )

export const asyncAll = <E, R>(
  checks: Iterable<boolean | Effect.Effect<boolean, E, R>>
): Effect.Effect<boolean, E, R> =>
  Effect.gen(function*(_) {
    for (const check of checks) {
      const passed = Effect.isEffect(check) ? yield* _(check) : check
      if (!passed) {
        return false
      }
    }
    return true
  })
