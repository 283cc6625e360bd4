import type { Id } from './id.js'

/**
 * Orders two ids by timestamp and sequence, like {@link Id.compare}.
 */
export function compare(a: Id, b: Id): -1 | 0 | 1 {
  return a.compare(b)
}

/**
 * Sorts ids in place, oldest first, and returns the same array.
 * Ids with the same timestamp and sequence keep their relative order.
 */
export function sort(ids: Id[]): Id[] {
  return ids.sort(compare)
}
