/**
 * Pure, deterministic mapping between a typed value and bytes.
 *
 * Byte adapters never see codecs; `CodecDataCache` applies them. `decode`
 * throws on bytes it cannot read.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}
