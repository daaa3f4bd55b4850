/**
 * Loads raw configuration values. Validation and coercion happen downstream
 * in the schema; a source only reads.
 *
 * Sources are applied in order and later ones win. A key whose value is
 * `undefined` counts as not provided.
 */
export interface ConfigSource {
  /** Shown by `explain()`, e.g. `env` or `dotenv:.env.test`. */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
