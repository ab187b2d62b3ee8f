/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ BATCH_SIZE: z._default(z.coerce.number(), 1000) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("BATCH_SIZE")     // 1000
 * config.explain("BATCH_SIZE") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  keys(): string[]

  /**
   * Name of the source that provided the final value, or `"default"` when the
   * schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Names of the sources that contributed at least one value.
   */
  sourcesUsed(): string[]

  /**
   * Keys that sources provided but the schema does not know. Usually typos or
   * stale settings.
   */
  unknownKeys(): string[]
}
