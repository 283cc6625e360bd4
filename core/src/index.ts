/**
 * @sortid/core - compact, time-ordered unique ids
 *
 * - 10-byte ids: 48-bit millisecond timestamp, 16-bit sequence, 16 random bits
 * - 16-character base32 text form that sorts like the binary form
 * - Monotonic generator safe to share across worker threads
 */

// === Ids ===

export { Id, nilId } from './id.js'
export { compare, sort } from './sort.js'

// === Generation ===

export {
  IdGenerator,
  createGenerator,
  newId,
  systemClock,
} from './generator.js'
export type { Clock, RandomSource, Tick, IdGeneratorOptions } from './generator.js'

// === Codec ===

export { encode, encodeInto, decode, isValidEncoding } from './codec.js'

// === Boundaries (JSON, SQL, schema) ===

export {
  nullable,
  orNil,
  toJSONValue,
  fromJSONValue,
  toSqlValue,
  fromSqlValue,
  idSchema,
} from './marshal.js'
export type { MaybeId } from './marshal.js'

// === Errors ===

export {
  ErrorCode,
  SortIdError,
  InvalidIdError,
  UnsupportedValueError,
  InvalidConfigError,
  toErrorObject,
  isSortIdError,
  isInvalidIdError,
  wrapError,
} from './errors.js'
export type { ErrorObject, InvalidIdReason } from './errors.js'

// === Logging ===

export { createLogger, logError, isLogLevel, sanitize } from './logger.js'
export type { Logger, LogLevel, LogContext, LogEntry } from './logger.js'

// === Constants ===

export { ALPHABET, RAW_LEN, ENCODED_LEN, NIL_ENCODED } from './config.js'
