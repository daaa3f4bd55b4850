import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys with this prefix are read; the prefix is stripped. */
  prefix?: string

  /** Default: `process.env` */
  env?: Record<string, string | undefined>

  /**
   * Treat `KEY=` as not provided, so schema defaults still apply.
   * @default true
   */
  emptyAsUndefined?: boolean
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>
  private readonly emptyAsUndefined: boolean

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.emptyAsUndefined = options.emptyAsUndefined ?? true
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (!key.startsWith(this.prefix)) continue
      if (this.emptyAsUndefined && value === "") continue

      values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
