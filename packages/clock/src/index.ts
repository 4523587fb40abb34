export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export type { Clock } from "./ports/clock"
export type { Milliseconds, UnixMs } from "./ports/time"
