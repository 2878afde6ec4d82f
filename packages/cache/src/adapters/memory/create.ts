import { type Clock, SystemClock } from "../../core/time/clock"
import { MemoryLruStore } from "./memory-lru-store"

export function createMemoryLruStore(deps: { clock?: Clock } = {}): MemoryLruStore {
  return new MemoryLruStore({ clock: deps.clock ?? new SystemClock() })
}
