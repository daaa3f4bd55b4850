/**
 * Validated, read-only configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ COUNTRIES_REFRESH_FLOOR_MS: z.coerce.number().default(500) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("COUNTRIES_REFRESH_FLOOR_MS") // 500
 * config.explain("COUNTRIES_REFRESH_FLOOR_MS") // "default"
 * ```
 */
export interface TypedConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that supplied the final value of `key`, or `"default"`
   * when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Source names that supplied at least one value. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not know. */
  unknownKeys(): string[]
}
