import { EventEmitter } from "node:events"
import type { Logger } from "@keel/logger"
import { type MockProxy, mock } from "vitest-mock-extended"
import { ShutdownHookError } from "../errors"
import { Lifecycle } from "../lifecycle"

describe("Lifecycle", () => {
  let fakeProcess: EventEmitter
  let logger: MockProxy<Logger>
  let lifecycle: Lifecycle

  beforeEach(() => {
    fakeProcess = new EventEmitter()
    logger = mock<Logger>()
    logger.child.mockReturnValue(logger)
    lifecycle = new Lifecycle({ process: fakeProcess, logger })
  })

  describe("signals", () => {
    it("listens for the termination signals", () => {
      expect(fakeProcess.listenerCount("SIGHUP")).toBe(1)
      expect(fakeProcess.listenerCount("SIGINT")).toBe(1)
      expect(fakeProcess.listenerCount("SIGTERM")).toBe(1)
      expect(fakeProcess.listenerCount("SIGQUIT")).toBe(1)
    })

    it("moves to shutting-down and aborts the signal on receipt", () => {
      fakeProcess.emit("SIGTERM")

      expect(lifecycle.state).toBe("shutting-down")
      expect(lifecycle.signal.aborted).toBe(true)
      expect(lifecycle.shutdownReason()).toEqual({
        trigger: "signal",
        signal: "SIGTERM",
        message: "shutdown by signal SIGTERM",
      })
    })

    it("keeps the first reason when a second signal arrives", () => {
      fakeProcess.emit("SIGINT")
      fakeProcess.emit("SIGQUIT")

      expect(lifecycle.shutdownReason()?.signal).toBe("SIGINT")
    })

    it("removes its listeners once terminated", async () => {
      fakeProcess.emit("SIGHUP")
      await lifecycle.wait()

      expect(lifecycle.state).toBe("terminated")
      expect(fakeProcess.listenerCount("SIGHUP")).toBe(0)
      expect(fakeProcess.listenerCount("SIGTERM")).toBe(0)
    })
  })

  describe("shutdown", () => {
    it("starts in the running state", () => {
      expect(lifecycle.state).toBe("running")
      expect(lifecycle.signal.aborted).toBe(false)
      expect(lifecycle.shutdownReason()).toBeUndefined()
    })

    it("is idempotent", () => {
      lifecycle.shutdown()
      lifecycle.shutdown("second")

      expect(lifecycle.shutdownReason()).toEqual({
        trigger: "shutdown",
        message: "shutdown requested",
      })
      expect(logger.warn).toHaveBeenCalledTimes(1)
    })

    it("passes the reason to abort listeners", () => {
      lifecycle.shutdown("maintenance")

      expect(lifecycle.signal.reason).toEqual({ trigger: "shutdown", message: "maintenance" })
    })
  })

  describe("wait", () => {
    it("stays pending until shutdown is triggered", async () => {
      const hook = vi.fn()
      lifecycle.addShutdownHook("db", hook)

      let settled = false
      void lifecycle.wait().then(() => {
        settled = true
      })

      await Promise.resolve()
      await Promise.resolve()

      expect(settled).toBe(false)
      expect(hook).not.toHaveBeenCalled()

      lifecycle.shutdown()
      await lifecycle.wait()

      expect(settled).toBe(true)
      expect(hook).toHaveBeenCalledTimes(1)
    })

    it("runs hooks sequentially in registration order", async () => {
      const calls: string[] = []

      lifecycle.addShutdownHook("first", async () => {
        calls.push("first:start")
        await new Promise((resolve) => setTimeout(resolve, 5))
        calls.push("first:end")
      })
      lifecycle.addShutdownHook("second", () => {
        calls.push("second")
      })

      lifecycle.shutdown()
      await lifecycle.wait()

      expect(calls).toEqual(["first:start", "first:end", "second"])
      expect(logger.info).toHaveBeenCalledWith("Executed shutdown hook: first")
      expect(logger.info).toHaveBeenCalledWith("Executed shutdown hook: second")
    })

    it("resolves with the recorded reason", async () => {
      fakeProcess.emit("SIGINT")

      await expect(lifecycle.wait()).resolves.toEqual({
        trigger: "signal",
        signal: "SIGINT",
        message: "shutdown by signal SIGINT",
      })
    })

    it("runs each hook once under concurrent shutdowns and racing waits", async () => {
      const hook = vi.fn()
      lifecycle.addShutdownHook("cache", hook)

      const waits = Array.from({ length: 10 }, () => lifecycle.wait())
      for (let i = 0; i < 10; i++) lifecycle.shutdown()
      fakeProcess.emit("SIGTERM")

      const reasons = await Promise.all([...waits, lifecycle.wait()])

      expect(hook).toHaveBeenCalledTimes(1)
      expect(new Set(reasons).size).toBe(1)
      expect(lifecycle.wait()).toBe(lifecycle.wait())
    })

    it("rejects every caller and skips later hooks when a hook throws", async () => {
      const later = vi.fn()
      const cause = new Error("connection reset")

      lifecycle.addShutdownHook("flush", () => {
        throw cause
      })
      lifecycle.addShutdownHook("later", later)

      const first = lifecycle.wait()
      const second = lifecycle.wait()
      lifecycle.shutdown()

      await expect(first).rejects.toThrow(ShutdownHookError)
      await expect(second).rejects.toThrow('Shutdown hook "flush" failed')

      const err = await first.catch((e: unknown) => e)
      expect(err).toBeInstanceOf(ShutdownHookError)
      if (err instanceof ShutdownHookError) {
        expect(err.hook).toBe("flush")
        expect(err.cause).toBe(cause)
      }

      expect(later).not.toHaveBeenCalled()
      expect(lifecycle.state).toBe("terminated")
      expect(logger.error).toHaveBeenCalledWith("Shutdown hook failed: flush", { err: cause })
    })

    it("ignores hooks added once the drain has started", async () => {
      const late = vi.fn()

      lifecycle.addShutdownHook("early", () => {
        lifecycle.addShutdownHook("late", late)
      })

      lifecycle.shutdown()
      await lifecycle.wait()

      expect(late).not.toHaveBeenCalled()
    })
  })

  describe("hooks", () => {
    it("lists hooks in registration order", () => {
      lifecycle.addShutdownHook("a", vi.fn())
      lifecycle.addShutdownHook("b", vi.fn())

      expect(lifecycle.listShutdownHooks()).toEqual(["a", "b"])
    })

    it("removes every hook with the given name", async () => {
      const removed = vi.fn()
      const kept = vi.fn()

      lifecycle.addShutdownHook("a", removed)
      lifecycle.addShutdownHook("b", kept)
      lifecycle.addShutdownHook("a", removed)

      expect(lifecycle.removeShutdownHook("a")).toBe(true)
      expect(lifecycle.removeShutdownHook("missing")).toBe(false)
      expect(lifecycle.listShutdownHooks()).toEqual(["b"])

      lifecycle.shutdown()
      await lifecycle.wait()

      expect(removed).not.toHaveBeenCalled()
      expect(kept).toHaveBeenCalledTimes(1)
    })
  })

  describe("deadline", () => {
    beforeEach(() => {
      vi.useFakeTimers()
    })

    afterEach(() => {
      vi.useRealTimers()
    })

    it("triggers shutdown once the deadline elapses", () => {
      lifecycle.setDeadline(1_000)

      vi.advanceTimersByTime(999)
      expect(lifecycle.state).toBe("running")

      vi.advanceTimersByTime(1)
      expect(lifecycle.shutdownReason()).toEqual({
        trigger: "deadline",
        message: "deadline exceeded",
      })
    })

    it("replaces an earlier deadline", () => {
      lifecycle.setDeadline(100)
      lifecycle.setDeadline(500)

      vi.advanceTimersByTime(100)
      expect(lifecycle.state).toBe("running")

      vi.advanceTimersByTime(400)
      expect(lifecycle.state).toBe("shutting-down")
    })

    it("is cleared by an earlier shutdown", () => {
      lifecycle.setDeadline(100)
      lifecycle.shutdown()

      vi.advanceTimersByTime(100)

      expect(lifecycle.shutdownReason()?.trigger).toBe("shutdown")
      expect(vi.getTimerCount()).toBe(0)
    })
  })
})
