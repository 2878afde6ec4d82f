/**
 * Validated configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: cacheEnvSchema,
 *   sources: [new ObjectSource({ MAX_SIZE: 500 }), new EnvSource()],
 * })
 *
 * config.value.MAX_SIZE       // 500, unless LRU_MAX_SIZE is set
 * config.explain("MAX_SIZE")  // "env" or "object:overrides"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  /**
   * Which source provided the final value for a key; `"default"` for
   * values filled in by the schema.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Names of all sources that contributed at least one value.
   */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   *
   * Useful for detecting typos such as `LRU_MAXSIZE`.
   */
  unknownKeys(): string[]
}

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly mergedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): T {
    return this.data
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  unknownKeys(): string[] {
    const used = new Set(Object.keys(this.data))

    return [...this.mergedKeys].filter((k) => !used.has(k))
  }
}
