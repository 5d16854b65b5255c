import type { EnvSource } from "../../ports/source"

export type ProcessEnvSourceOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>
}

export class ProcessEnvSource implements EnvSource {
  readonly name = "env"
  private readonly env: Record<string, string | undefined>

  constructor(options: ProcessEnvSourceOptions = {}) {
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, string | undefined>> {
    return { ...this.env }
  }
}
