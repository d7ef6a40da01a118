// CHANGE: memoize a derived value per instance without touching the instance
// WHY: derived fields such as creation time are computed on first read and reused
// SOURCE: n/a
// FORMAT THEOREM: forall o: read(o) = read(o) ∧ compute is applied at most once per o
// PURITY: CORE
// INVARIANT: cache entries are released with their instance
// COMPLEXITY: O(1)/O(k) where k = live instances read
export const cachedProperty = <Self extends object, A>(
  compute: (self: Self) => A
): ((self: Self) => A) => {
  const cache = new WeakMap<Self, { readonly value: A }>()
  return (self) => {
    const hit = cache.get(self)
    if (hit !== undefined) {
      return hit.value
    }
    const value = compute(self)
    cache.set(self, { value })
    return value
  }
}

export type SlotHolder<Slot extends string, A> = { [K in Slot]: A | undefined }

/**
 * Memoizes into a field the instance declares itself, e.g.
 * `cachedDisplayName: string | undefined = undefined`.
 *
 * The field doubles as the cache, so assigning `undefined` to it forces a
 * recompute on the next read.
 */
export const cachedSlotProperty = <Self extends SlotHolder<Slot, A>, Slot extends string, A>(
  slot: Slot,
  compute: (self: Self) => A
): ((self: Self) => A) =>
(self) => {
  const holder: SlotHolder<Slot, A> = self
  const cached = holder[slot]
  if (cached !== undefined) {
    return cached
  }
  const value = compute(self)
  holder[slot] = value
  return value
}
