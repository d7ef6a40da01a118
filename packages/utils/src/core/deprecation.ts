export type DeprecationOptions = {
  readonly instead?: string | undefined
  readonly since?: string | undefined
  readonly removed?: string | undefined
  readonly reference?: string | undefined
}

/**
 * Builds the warning text for a deprecated API.
 *
 * @example
 * formatDeprecationMessage("login", { since: "2.0", instead: "connect" })
 * // "login is deprecated since version 2.0, consider using connect instead."
 *
 * @pure true
 * @complexity O(1) time / O(1) space
 */
export const formatDeprecationMessage = (name: string, options: DeprecationOptions = {}): string => {
  const since = options.since ? ` since version ${options.since}` : ""
  const removed = options.removed ? ` and will be removed in version ${options.removed}` : ""
  const instead = options.instead ? `, consider using ${options.instead} instead` : ""
  const reference = options.reference ? ` See ${options.reference} for more information.` : ""
  return `${name} is deprecated${since}${removed}${instead}.${reference}`
}
