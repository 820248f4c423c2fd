import type { Milliseconds, Seconds } from "@hearth/clock"

type SecondsTtl = { kind: "seconds"; seconds: Seconds }
type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }
type UntilDateTtl = { kind: "until"; expiresAt: Date }

export type CacheTtl = SecondsTtl | MillisecondsTtl | UntilDateTtl

export const Ttl = {
  seconds: (seconds: Seconds): CacheTtl => ({ kind: "seconds", seconds }),
  milliseconds: (milliseconds: Milliseconds): CacheTtl => ({
    kind: "milliseconds",
    milliseconds,
  }),
  until: (expiresAt: Date): CacheTtl => ({ kind: "until", expiresAt }),
}

export type CacheSetOptions = {
  /** Omitted: the entry lives until evicted or invalidated. */
  ttl: CacheTtl
}
