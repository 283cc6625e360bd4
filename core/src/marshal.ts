/**
 * Serialization boundaries
 *
 * Outside the process, "no id" travels as JSON `null` or SQL `NULL`. Inside,
 * it is modelled as `MaybeId` (`Id | null`); the all-zero {@link Id.NIL}
 * sentinel is only produced or consumed here, at the boundary.
 */

import { z } from 'zod'
import { InvalidIdError, UnsupportedValueError } from './errors.js'
import { Id } from './id.js'

export type MaybeId = Id | null

/** `null` for the nil sentinel, the id otherwise */
export function nullable(id: Id): MaybeId {
  return id.isNil() ? null : id
}

/** The nil sentinel for a missing id */
export function orNil(id: MaybeId | undefined): Id {
  return id ?? Id.NIL
}

function typeName(value: unknown): string {
  if (value === null) return 'null'
  if (typeof value === 'object') return value.constructor?.name ?? 'object'
  return typeof value
}

// ============================================================================
// JSON
// ============================================================================

/**
 * The JSON value for an id: its text form, or `null` for a missing or nil id.
 */
export function toJSONValue(id: MaybeId): string | null {
  if (id === null || id.isNil()) return null
  return id.toString()
}

/**
 * Reads an id from a parsed JSON value.
 * @throws InvalidIdError for a string that does not decode
 * @throws UnsupportedValueError for anything but a string or `null`
 */
export function fromJSONValue(value: unknown): MaybeId {
  if (value === null) return null
  if (typeof value !== 'string') {
    throw new UnsupportedValueError(typeName(value))
  }
  return nullable(Id.fromString(value))
}

// ============================================================================
// SQL
// ============================================================================

/**
 * The column value for an id: its text form, or `NULL` for a missing or nil id.
 */
export function toSqlValue(id: MaybeId): string | null {
  return toJSONValue(id)
}

/**
 * Reads an id from a column value as returned by a database driver:
 * text, the UTF-8 bytes of the text, or `null`.
 * @throws UnsupportedValueError for any other type
 */
export function fromSqlValue(value: unknown): MaybeId {
  if (value === null || value === undefined) return null
  if (typeof value === 'string') {
    return nullable(Id.fromString(value))
  }
  if (value instanceof Uint8Array) {
    return nullable(Id.fromString(new TextDecoder().decode(value)))
  }
  throw new UnsupportedValueError(typeName(value))
}

// ============================================================================
// Schema
// ============================================================================

/**
 * Parses the text form into an {@link Id}, reporting decode failures as
 * schema issues.
 *
 * @example
 * ```typescript
 * const Order = z.object({ id: idSchema, total: z.number() })
 * Order.parse({ id: '06bpkb8pz000fkgw', total: 12 }).id.timestamp()
 * ```
 */
export const idSchema = z.string().transform((text, ctx): Id => {
  try {
    return Id.fromString(text)
  } catch (err) {
    if (!(err instanceof InvalidIdError)) throw err
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err.message,
      params: { reason: err.reason },
    })
    return z.NEVER
  }
})
