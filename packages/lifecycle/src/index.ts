export { ShutdownHookError } from "./core/errors"
export {
  Lifecycle,
  type LifecycleDeps,
  type LifecycleState,
  SHUTDOWN_SIGNALS,
} from "./core/lifecycle"
export type { ShutdownHook, ShutdownHookFn } from "./ports/shutdown-hook"
export type { ShutdownReason, ShutdownTrigger } from "./ports/shutdown-reason"
export type { SignalListener, SignalSource } from "./ports/signal-source"
