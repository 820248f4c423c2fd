import superjson from "superjson"
import type { Codec } from "../../ports/codec"

type SuperJsonEnvelope = Parameters<typeof superjson.deserialize>[0]

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

function isEnvelope(value: unknown): value is SuperJsonEnvelope {
  return (
    typeof value === "object" && value !== null && !Array.isArray(value) && "json" in value
  )
}

/**
 * JSON codec that keeps `Date`, `Map`, `Set` and `bigint` intact. Entities
 * carry timestamps, so plain `JSON.parse` would hand back strings.
 *
 * Decoding throws on anything but the `{ json, meta }` envelope it writes:
 * plain JSON from another writer is not a value of `T`.
 */
export function createJsonCodec<T>(): Codec<T> {
  return {
    encode: (value: T) => encoder.encode(superjson.stringify(value)),
    decode: (bytes: Uint8Array) => {
      const parsed: unknown = JSON.parse(decoder.decode(bytes))

      if (!isEnvelope(parsed)) {
        throw new TypeError("Cache payload is not a superjson envelope")
      }

      return superjson.deserialize<T>(parsed)
    },
  }
}
