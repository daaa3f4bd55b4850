/**
 * Converts a typed value to bytes and back for a {@link BytesKeyValueStore}.
 *
 * Codecs are pure. Byte stores treat their output as opaque and never import
 * a codec themselves; the pairing happens where stores are wired.
 *
 * @remarks
 * A plain JSON codec loses `Date`, `Map`, `Set` and `undefined`. Use a codec
 * that keeps them when the stored type has such fields.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  /** Throws when the bytes do not hold a `T`. */
  decode(bytes: Uint8Array): T
}
