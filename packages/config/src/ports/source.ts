/**
 * Loads raw configuration. Sources neither validate nor coerce; later sources
 * override earlier ones key by key.
 */
export interface ConfigSource {
  /**
   * Provenance label, e.g. `env` or `dotenv:.env.local`.
   */
  readonly name: string

  /**
   * An `undefined` value means the key is not provided.
   */
  load(): Promise<Record<string, unknown>>
}
