import {
  type DocumentSource,
  type EnvSource,
  type MapNode,
  resolveBootDocument,
} from "@keel/config"
import { toAppError } from "@keel/errors"
import { Lifecycle, type ShutdownReason } from "@keel/lifecycle"
import { type Logger, PinoLogger } from "@keel/logger"
import { type Entry, type EntryContext, Registry } from "@keel/registry"
import type { EntryFactory, FactoryContext } from "../ports/entry-factory"
import type { LocaleEnv } from "../ports/locale-env"
import { BootError } from "./errors"
import { appInfoFactory, configFactory } from "./factories"
import { localeEnvFrom } from "./locale"

export type ExitFn = (code: number) => void

export type BootstrapperDeps = {
  document: DocumentSource
  /** @default new Registry() */
  registry?: Registry
  /** @default new Lifecycle({ logger }) */
  lifecycle?: Lifecycle
  /** @default new PinoLogger() */
  logger?: Logger
  /** @default process.exit */
  exit?: ExitFn
}

export type BootstrapperOptions = {
  /** Passed to resolveBootDocument. */
  env?: EnvSource[]
  argv?: readonly string[]
  envPrefix?: string
  flagName?: string
  /** @default read from REALM, REGION, AZ and DOMAIN */
  locale?: LocaleEnv
  /** @default process.cwd() */
  cwd?: string
  /** Register the app and config factories. @default true */
  builtins?: boolean
}

type NamedFactory = { name: string; factory: EntryFactory }

/**
 * Runs a process from its boot document.
 *
 * Preload factories run and bootstrap first, then the regular ones. Every
 * bootstrapped entry is interrupted in reverse order once shutdown is
 * triggered.
 *
 * @example
 * ```typescript
 * const boot = new Bootstrapper({
 *   document: new YamlSource({ file: "boot.yaml", required: true }),
 * })
 *
 * boot.addFactory("gin", ginFactory)
 *
 * await boot.bootstrap()
 * await boot.waitForShutdown()
 * ```
 */
export class Bootstrapper {
  readonly registry: Registry
  readonly lifecycle: Lifecycle

  private readonly logger: Logger
  private readonly exit: ExitFn
  private readonly preload: NamedFactory[] = []
  private readonly regular: NamedFactory[] = []
  private readonly started: Entry[] = []
  private booting: Promise<void> | undefined

  constructor(
    private readonly deps: BootstrapperDeps,
    private readonly opts: BootstrapperOptions = {},
  ) {
    const logger = deps.logger ?? new PinoLogger()

    this.registry = deps.registry ?? new Registry()
    this.lifecycle = deps.lifecycle ?? new Lifecycle({ logger })
    this.logger = logger.child({ module: "boot", eventId: this.registry.eventId() })
    this.exit = deps.exit ?? ((code) => process.exit(code))

    this.lifecycle.addShutdownHook("interrupt-entries", () => this.interruptAll())

    if (opts.builtins ?? true) {
      this.addPreloadFactory("app", appInfoFactory)
      this.addFactory("config", configFactory)
    }
  }

  /** Factories whose entries bootstrap before any regular factory runs. */
  addPreloadFactory(name: string, factory: EntryFactory): void {
    this.preload.push({ name, factory })
  }

  addFactory(name: string, factory: EntryFactory): void {
    this.regular.push({ name, factory })
  }

  /**
   * Resolves the boot document, then creates, registers and bootstraps
   * every entry. Any failure is logged at fatal level and exits the
   * process with code 1. Later calls return the first call's promise.
   */
  bootstrap(): Promise<void> {
    if (!this.booting) {
      this.booting = this.runBootstrap()
    }

    return this.booting
  }

  private async runBootstrap(): Promise<void> {
    try {
      const { document, documentName } = await resolveBootDocument({
        document: this.deps.document,
        env: this.opts.env,
        argv: this.opts.argv,
        envPrefix: this.opts.envPrefix,
        flagName: this.opts.flagName,
        logger: this.logger,
      })

      this.logger.info("Boot document resolved", { document: documentName })

      await this.run(this.preload, document)
      await this.run(this.regular, document)

      this.logger.info("Bootstrap complete", {
        service: this.registry.serviceName(),
        version: this.registry.serviceVersion(),
        entries: this.started.length,
      })
    } catch (err) {
      this.logger.fatal("Bootstrap failed", { err: toAppError(err, "bootstrap_failed") })
      this.exit(1)
    }
  }

  /** Blocks until shutdown is triggered and every hook has run. */
  async waitForShutdown(): Promise<ShutdownReason> {
    const reason = await this.lifecycle.wait()

    this.logger.info("Shutdown complete", { reason: reason.message })

    return reason
  }

  private async run(factories: NamedFactory[], document: MapNode): Promise<void> {
    const ctx: FactoryContext = {
      registry: this.registry,
      logger: this.logger,
      locale: this.opts.locale ?? localeEnvFrom(process.env),
      cwd: this.opts.cwd ?? process.cwd(),
    }

    const created: Entry[] = []
    for (const { name, factory } of factories) {
      const entries = await factory(document, ctx)

      for (const entry of entries) {
        this.registry.addEntry(entry)
        created.push(entry)
      }

      this.logger.debug("Factory registered entries", { factory: name, count: entries.length })
    }

    for (const entry of created) {
      await this.bootstrapEntry(entry)
    }
  }

  private async bootstrapEntry(entry: Entry): Promise<void> {
    try {
      await entry.bootstrap(this.entryContext(entry))
    } catch (err) {
      throw new BootError(`Entry ${entry.kind()}:${entry.name()} failed to bootstrap`, {
        code: "entry_bootstrap",
        context: { entryKind: entry.kind(), entryName: entry.name() },
        cause: err,
      })
    }

    this.started.push(entry)
    this.logger.debug("Entry bootstrapped", { entryKind: entry.kind(), entryName: entry.name() })
  }

  private async interruptAll(): Promise<void> {
    for (const entry of [...this.started].reverse()) {
      await entry.interrupt(this.entryContext(entry))
      this.logger.debug("Entry interrupted", { entryKind: entry.kind(), entryName: entry.name() })
    }
  }

  private entryContext(entry: Entry): EntryContext {
    return {
      signal: this.lifecycle.signal,
      logger: this.logger.child({ entryKind: entry.kind(), entryName: entry.name() }),
    }
  }
}
