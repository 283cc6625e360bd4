/**
 * Core Configuration Constants
 *
 * Centralized configuration for the @sortid/core package.
 * All magic numbers of the id layout and the tick derivation are defined here.
 */

// ============================================================================
// Id Layout
// ============================================================================

/** Length of an id in bytes */
export const RAW_LEN = 10

/** Length of an encoded id in characters */
export const ENCODED_LEN = 16

/** Bytes 0-5 hold the timestamp, 6-7 the sequence, 8-9 the random field */
export const TIMESTAMP_OFFSET = 0
export const SEQUENCE_OFFSET = 6
export const RANDOM_OFFSET = 8

/** Largest timestamp the 48-bit field holds (year 10889) */
export const MAX_TIMESTAMP = 2 ** 48 - 1

/** Largest value of the 16-bit sequence field */
export const MAX_SEQUENCE = 0xffff

/** Number of leading bytes that take part in ordering (timestamp + sequence) */
export const ORDERED_LEN = 8

// ============================================================================
// Encoding
// ============================================================================

/**
 * Base32 alphabet without the vowels a, i, o and u.
 * Code points increase strictly so text order matches byte order.
 */
export const ALPHABET = '0123456789bcdefghjklmnpqrstvwxyz'

/** Text form of the nil id */
export const NIL_ENCODED = '0000000000000000'

// ============================================================================
// Tick Derivation
// ============================================================================

/** Nanoseconds per millisecond */
export const NANOS_PER_MILLI = 1_000_000n

/** Bits of the tick reserved for the sequence */
export const SEQUENCE_BITS = 12n

/** Mask extracting the sequence from a tick */
export const SEQUENCE_MASK = 0xfffn

/** Right shift mapping the sub-millisecond remainder (0..999_999 ns) onto 0..3906 */
export const SUB_MILLI_SHIFT = 8n

/** Size of the tick state buffer in bytes (one 64-bit word) */
export const TICK_STATE_BYTES = 8
