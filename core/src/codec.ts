/**
 * Base32 codec for 10-byte ids.
 *
 * 80 bits map onto exactly 16 characters of 5 bits each, most significant
 * first, so there is never any padding. The packing is unrolled per
 * character rather than looped.
 */

import { ALPHABET, ENCODED_LEN, RAW_LEN } from './config.js'
import { InvalidIdError } from './errors.js'

/** Marks characters outside the alphabet in DECODING */
const INVALID = 0xff

/** ASCII code of each alphabet symbol, indexed by 5-bit value */
const ENCODING = Uint8Array.from(ALPHABET, (c) => c.charCodeAt(0))

/** 5-bit value of each ASCII code, INVALID when not in the alphabet */
const DECODING = new Uint8Array(256).fill(INVALID)
for (let i = 0; i < ENCODING.length; i++) {
  DECODING[ENCODING[i]] = i
}

function assertRaw(raw: Uint8Array): void {
  if (raw.length !== RAW_LEN) {
    throw new InvalidIdError('byte-length', { length: raw.length })
  }
}

/**
 * Writes the 16 ASCII characters for `raw` into `dst` and returns `dst`.
 */
export function encodeInto(dst: Uint8Array, raw: Uint8Array): Uint8Array {
  assertRaw(raw)
  if (dst.length < ENCODED_LEN) {
    throw new RangeError(`encodeInto: destination needs ${ENCODED_LEN} bytes, got ${dst.length}`)
  }
  const b0 = raw[0], b1 = raw[1], b2 = raw[2], b3 = raw[3], b4 = raw[4]
  const b5 = raw[5], b6 = raw[6], b7 = raw[7], b8 = raw[8], b9 = raw[9]
  const e = ENCODING

  // bytes 0-4 -> characters 0-7
  dst[0] = e[b0 >> 3]
  dst[1] = e[((b0 << 2) | (b1 >> 6)) & 0x1f]
  dst[2] = e[(b1 >> 1) & 0x1f]
  dst[3] = e[((b1 << 4) | (b2 >> 4)) & 0x1f]
  dst[4] = e[((b2 << 1) | (b3 >> 7)) & 0x1f]
  dst[5] = e[(b3 >> 2) & 0x1f]
  dst[6] = e[((b3 << 3) | (b4 >> 5)) & 0x1f]
  dst[7] = e[b4 & 0x1f]

  // bytes 5-9 -> characters 8-15
  dst[8] = e[b5 >> 3]
  dst[9] = e[((b5 << 2) | (b6 >> 6)) & 0x1f]
  dst[10] = e[(b6 >> 1) & 0x1f]
  dst[11] = e[((b6 << 4) | (b7 >> 4)) & 0x1f]
  dst[12] = e[((b7 << 1) | (b8 >> 7)) & 0x1f]
  dst[13] = e[(b8 >> 2) & 0x1f]
  dst[14] = e[((b8 << 3) | (b9 >> 5)) & 0x1f]
  dst[15] = e[b9 & 0x1f]

  return dst
}

/**
 * Encodes 10 raw bytes as a 16-character string.
 */
export function encode(raw: Uint8Array): string {
  return String.fromCharCode(...encodeInto(new Uint8Array(ENCODED_LEN), raw))
}

/**
 * Maps each character of `text` to its 5-bit value.
 * Throws on a wrong length or on any character outside the alphabet.
 */
function toDigits(text: string): Uint8Array {
  if (text.length !== ENCODED_LEN) {
    throw new InvalidIdError('length', { length: text.length })
  }
  const digits = new Uint8Array(ENCODED_LEN)
  for (let i = 0; i < ENCODED_LEN; i++) {
    const code = text.charCodeAt(i)
    const digit = code < DECODING.length ? DECODING[code] : INVALID
    if (digit === INVALID) {
      throw new InvalidIdError('character', { position: i, char: text.charAt(i) })
    }
    digits[i] = digit
  }
  return digits
}

/**
 * Decodes a 16-character string into 10 raw bytes.
 *
 * Decoding is case-sensitive: only the lowercase alphabet is accepted.
 * Throws InvalidIdError on any failure; the returned array is only ever
 * a fully decoded value.
 */
export function decode(text: string): Uint8Array {
  const d = toDigits(text)
  const d0 = d[0], d1 = d[1], d2 = d[2], d3 = d[3]
  const d4 = d[4], d5 = d[5], d6 = d[6], d7 = d[7]
  const d8 = d[8], d9 = d[9], d10 = d[10], d11 = d[11]
  const d12 = d[12], d13 = d[13], d14 = d[14], d15 = d[15]

  // Uint8Array keeps the low 8 bits of each assignment
  const raw = new Uint8Array(RAW_LEN)
  raw[9] = (d14 << 5) | d15
  if (ENCODING[raw[9] & 0x1f] !== text.charCodeAt(ENCODED_LEN - 1)) {
    throw new InvalidIdError('checksum', { position: ENCODED_LEN - 1, char: text.charAt(ENCODED_LEN - 1) })
  }
  raw[8] = (d12 << 7) | (d13 << 2) | (d14 >> 3)
  raw[7] = (d11 << 4) | (d12 >> 1)
  raw[6] = (d9 << 6) | (d10 << 1) | (d11 >> 4)
  raw[5] = (d8 << 3) | (d9 >> 2)
  raw[4] = (d6 << 5) | d7
  raw[3] = (d4 << 7) | (d5 << 2) | (d6 >> 3)
  raw[2] = (d3 << 4) | (d4 >> 1)
  raw[1] = (d1 << 6) | (d2 << 1) | (d3 >> 4)
  raw[0] = (d0 << 3) | (d1 >> 2)
  return raw
}

/**
 * Reports whether `text` would decode, without throwing.
 */
export function isValidEncoding(text: string): boolean {
  if (text.length !== ENCODED_LEN) return false
  for (let i = 0; i < ENCODED_LEN; i++) {
    const code = text.charCodeAt(i)
    if (code >= DECODING.length || DECODING[code] === INVALID) return false
  }
  return true
}
