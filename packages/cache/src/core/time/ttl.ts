import type { CacheTtl, TimeOfDay } from "../../ports/cache-options"
import type { Milliseconds } from "../../ports/time"
import type { Clock } from "./clock"

/**
 * Remaining lifetime a TTL grants from the clock's current instant. Zero or
 * negative when an `until` date has already passed.
 */
export function ttlToMs(ttl: CacheTtl, clock: Clock): Milliseconds {
  if (ttl.kind === "seconds") return ttl.seconds * 1000
  if (ttl.kind === "milliseconds") return ttl.milliseconds

  return ttl.expiresAt.getTime() - clock.nowMs()
}

/**
 * Next instant, strictly after now, at which the UTC wall clock reads `at`.
 */
export function nextDailyExpiry(at: TimeOfDay, clock: Clock): Date {
  const now = clock.now()

  const target = new Date(
    Date.UTC(
      now.getUTCFullYear(),
      now.getUTCMonth(),
      now.getUTCDate(),
      at.hour,
      at.minute ?? 0,
      at.second ?? 0,
    ),
  )

  if (target.getTime() <= now.getTime()) {
    target.setUTCDate(target.getUTCDate() + 1)
  }

  return target
}
