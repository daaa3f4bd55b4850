import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { TypedConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigValidationError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /** Default: `[new EnvSource()]` */
  sources?: ConfigSource[]
}

/**
 * Merge `sources` in order, validate the result against `schema` and record
 * which source supplied each key.
 *
 * @throws ConfigValidationError when the merged values do not match the schema
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<TypedConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }))

    throw new ConfigValidationError(issues, z.prettifyError(result.error))
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
