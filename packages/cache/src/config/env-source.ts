import type { ConfigSource } from "./source"

export type EnvSourceOptions = {
  /**
   * Only variables starting with this prefix are read; the prefix is
   * stripped from the resulting keys.
   *
   * @default "LRU_"
   */
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? "LRU_"
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    if (this.prefix === "") return { ...this.env }

    const filtered: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) {
        filtered[key.slice(this.prefix.length)] = value
      }
    }

    return filtered
  }
}
