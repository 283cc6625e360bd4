/**
 * Id - a 10-byte, k-sortable identifier
 *
 * Layout (big-endian):
 * - bytes 0-5: Unix time in milliseconds (48 bits)
 * - bytes 6-7: sequence within one generator tick
 * - bytes 8-9: random
 *
 * Ids are immutable. Two ids order by their first 8 bytes only; the random
 * bytes never take part in comparison.
 */

import { decode, encode, encodeInto } from './codec.js'
import {
  ENCODED_LEN,
  MAX_SEQUENCE,
  MAX_TIMESTAMP,
  ORDERED_LEN,
  RANDOM_OFFSET,
  RAW_LEN,
  SEQUENCE_OFFSET,
  TIMESTAMP_OFFSET,
} from './config.js'
import { InvalidIdError } from './errors.js'

export class Id {
  /** The all-zero id, used as the "no id" sentinel */
  static readonly NIL = new Id(new Uint8Array(RAW_LEN))

  private readonly raw: Uint8Array
  private readonly view: DataView
  private encoded: string | undefined

  private constructor(raw: Uint8Array) {
    this.raw = raw
    this.view = new DataView(raw.buffer, raw.byteOffset, RAW_LEN)
  }

  /**
   * Copies `bytes` into a new id. Only the length is checked.
   */
  static fromBytes(bytes: Uint8Array): Id {
    if (bytes.length !== RAW_LEN) {
      throw new InvalidIdError('byte-length', { length: bytes.length })
    }
    return new Id(Uint8Array.from(bytes))
  }

  /**
   * Decodes the 16-character text form.
   * @throws InvalidIdError when `text` is not a valid encoding
   */
  static fromString(text: string): Id {
    return new Id(decode(text))
  }

  /**
   * Packs a timestamp, sequence and the two random bytes into a new id.
   * @throws RangeError when a part does not fit its field
   */
  static fromParts(milli: number, seq: number, random: Uint8Array): Id {
    if (!Number.isInteger(milli) || milli < 0 || milli > MAX_TIMESTAMP) {
      throw new RangeError(`sortid: timestamp out of range: ${milli}`)
    }
    if (!Number.isInteger(seq) || seq < 0 || seq > MAX_SEQUENCE) {
      throw new RangeError(`sortid: sequence out of range: ${seq}`)
    }
    if (random.length !== RAW_LEN - RANDOM_OFFSET) {
      throw new RangeError(`sortid: random field must be ${RAW_LEN - RANDOM_OFFSET} bytes, got ${random.length}`)
    }
    const raw = new Uint8Array(RAW_LEN)
    const view = new DataView(raw.buffer)
    view.setUint16(TIMESTAMP_OFFSET, Math.floor(milli / 2 ** 32))
    view.setUint32(TIMESTAMP_OFFSET + 2, milli >>> 0)
    view.setUint16(SEQUENCE_OFFSET, seq)
    raw.set(random, RANDOM_OFFSET)
    return new Id(raw)
  }

  /** Milliseconds since the Unix epoch */
  timestamp(): number {
    return this.view.getUint16(TIMESTAMP_OFFSET) * 2 ** 32 + this.view.getUint32(TIMESTAMP_OFFSET + 2)
  }

  /** The timestamp as a Date, millisecond resolution */
  time(): Date {
    return new Date(this.timestamp())
  }

  sequence(): number {
    return this.view.getUint16(SEQUENCE_OFFSET)
  }

  random(): number {
    return this.view.getUint16(RANDOM_OFFSET)
  }

  /** A copy of the 10 raw bytes */
  bytes(): Uint8Array {
    return Uint8Array.from(this.raw)
  }

  isNil(): boolean {
    for (let i = 0; i < RAW_LEN; i++) {
      if (this.raw[i] !== 0) return false
    }
    return true
  }

  /** Alias of isNil */
  isZero(): boolean {
    return this.isNil()
  }

  /**
   * Orders by timestamp and sequence (bytes 0-7), ignoring the random bytes.
   */
  compare(other: Id): -1 | 0 | 1 {
    for (let i = 0; i < ORDERED_LEN; i++) {
      const a = this.raw[i]
      const b = other.raw[i]
      if (a !== b) return a < b ? -1 : 1
    }
    return 0
  }

  /** True when all 10 bytes match */
  equals(other: Id): boolean {
    for (let i = 0; i < RAW_LEN; i++) {
      if (this.raw[i] !== other.raw[i]) return false
    }
    return true
  }

  /**
   * Writes the 16 ASCII characters of the text form into `dst`.
   */
  encode(dst: Uint8Array = new Uint8Array(ENCODED_LEN)): Uint8Array {
    return encodeInto(dst, this.raw)
  }

  toString(): string {
    if (this.encoded === undefined) {
      this.encoded = encode(this.raw)
    }
    return this.encoded
  }

  toJSON(): string {
    return this.toString()
  }
}

/** The all-zero id */
export const nilId = Id.NIL
