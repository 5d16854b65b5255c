import { type Logger, NullLogger } from "@keel/logger"
import type { ShutdownHook, ShutdownHookFn } from "../ports/shutdown-hook"
import type { ShutdownReason } from "../ports/shutdown-reason"
import type { SignalListener, SignalSource } from "../ports/signal-source"
import { ShutdownHookError } from "./errors"

export const SHUTDOWN_SIGNALS = [
  "SIGHUP",
  "SIGINT",
  "SIGTERM",
  "SIGQUIT",
] as const satisfies readonly NodeJS.Signals[]

export type LifecycleState = "running" | "shutting-down" | "terminated"

export type LifecycleDeps = {
  /** @default process */
  process?: SignalSource
  logger?: Logger
}

/**
 * Coordinates process termination.
 *
 * A signal, `shutdown()` or an elapsed deadline aborts `signal` and moves
 * the lifecycle to "shutting-down". `wait()` then runs every shutdown hook
 * once, in registration order, and settles every caller with the same
 * outcome.
 */
export class Lifecycle {
  private readonly controller = new AbortController()
  private readonly hooks: ShutdownHook[] = []
  private readonly source: SignalSource
  private readonly logger: Logger
  private readonly listeners = new Map<NodeJS.Signals, SignalListener>()

  private current: LifecycleState = "running"
  private reason: ShutdownReason | undefined
  private draining: Promise<ShutdownReason> | undefined
  private deadline: NodeJS.Timeout | undefined

  private settle: (reason: ShutdownReason) => void = () => undefined
  private readonly triggered = new Promise<ShutdownReason>((resolve) => {
    this.settle = resolve
  })

  constructor(deps: LifecycleDeps = {}) {
    this.source = deps.process ?? process
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "lifecycle" })

    for (const signal of SHUTDOWN_SIGNALS) {
      const listener = () => this.onSignal(signal)
      this.listeners.set(signal, listener)
      this.source.on(signal, listener)
    }
  }

  /** Aborted once shutdown is triggered. */
  get signal(): AbortSignal {
    return this.controller.signal
  }

  get state(): LifecycleState {
    return this.current
  }

  shutdownReason(): ShutdownReason | undefined {
    return this.reason
  }

  /** Triggers shutdown. Calls after the first have no effect. */
  shutdown(message = "shutdown requested"): void {
    this.trigger({ trigger: "shutdown", message })
  }

  /** Triggers shutdown after `ms`, replacing any earlier deadline. */
  setDeadline(ms: number): void {
    this.clearDeadline()

    this.deadline = setTimeout(() => {
      this.trigger({ trigger: "deadline", message: "deadline exceeded" })
    }, ms)

    this.deadline.unref()
  }

  addShutdownHook(name: string, fn: ShutdownHookFn): void {
    this.hooks.push({ name, fn })
  }

  /** Removes every hook registered under `name`. Returns whether any was. */
  removeShutdownHook(name: string): boolean {
    const before = this.hooks.length

    for (let i = this.hooks.length - 1; i >= 0; i--) {
      if (this.hooks[i]?.name === name) this.hooks.splice(i, 1)
    }

    return this.hooks.length !== before
  }

  listShutdownHooks(): string[] {
    return this.hooks.map((hook) => hook.name)
  }

  /**
   * Resolves with the shutdown reason after shutdown is triggered and every
   * hook has run. A failing hook stops the remaining ones and rejects every
   * caller with a ShutdownHookError.
   */
  wait(): Promise<ShutdownReason> {
    if (!this.draining) {
      this.draining = this.drain()
    }

    return this.draining
  }

  private async drain(): Promise<ShutdownReason> {
    const reason = await this.triggered

    try {
      await this.runHooks([...this.hooks])
    } finally {
      this.current = "terminated"
      this.unregister()
    }

    return reason
  }

  private async runHooks(hooks: ShutdownHook[]): Promise<void> {
    for (const hook of hooks) {
      try {
        await hook.fn()
      } catch (err) {
        this.logger.error(`Shutdown hook failed: ${hook.name}`, { err })

        throw new ShutdownHookError(`Shutdown hook "${hook.name}" failed`, {
          code: "shutdown_hook",
          context: { hook: hook.name },
          cause: err,
        })
      }

      this.logger.info(`Executed shutdown hook: ${hook.name}`)
    }
  }

  private onSignal(signal: NodeJS.Signals): void {
    this.logger.info("Received signal", { signal })

    this.trigger({ trigger: "signal", signal, message: `shutdown by signal ${signal}` })
  }

  private trigger(reason: ShutdownReason): void {
    if (this.reason) return

    this.reason = reason
    this.current = "shutting-down"
    this.clearDeadline()

    this.logger.warn("Shutdown triggered", { reason: reason.message })

    this.controller.abort(reason)
    this.settle(reason)
  }

  private clearDeadline(): void {
    if (this.deadline) {
      clearTimeout(this.deadline)
      this.deadline = undefined
    }
  }

  private unregister(): void {
    for (const [signal, listener] of this.listeners) {
      this.source.off(signal, listener)
    }

    this.listeners.clear()
  }
}
