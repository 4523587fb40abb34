export { type CreateStartHooksFn, createStartHooks, usesPostgres } from "./start"
export { type CreateStopHooksFn, createStopHooks } from "./stop"
