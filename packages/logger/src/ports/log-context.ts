/**
 * Well-known structured fields. Adapters pass them through untouched; the
 * names exist so that call sites agree on spelling.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Identifier of one load pipeline run. */
  pipelineId: string

  /** Descriptor of the query being loaded, e.g. `countries:list`. */
  query: string

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Fields merged into a child logger's context. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
