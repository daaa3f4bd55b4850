import { type LazyList, type LoadableState, LoadableSubject } from "@atlas/loadable"
import { type AppContextOptions, createAppContext } from "./app/create-context"
import type { Country } from "./domains/countries/model/country.model"

export type SearchInput = {
  search: string
  locale: string
}

type Settled<T> = Extract<LoadableState<T>, { kind: "loaded" | "failed" }>

function settled<T>(subject: LoadableSubject<T>): Promise<Settled<T>> {
  return new Promise((resolve) => {
    const subscription = subject.subscribe((state) => {
      if (state.kind !== "loaded" && state.kind !== "failed") return

      queueMicrotask(() => subscription.cancel())
      resolve(state)
    })
  })
}

/**
 * Boot the app, run one country search and shut down again.
 */
export async function run(
  input: SearchInput,
  options: AppContextOptions = {},
): Promise<Settled<LazyList<Country>>> {
  const ctx = await createAppContext(options)
  const { logger } = ctx.services.core

  await ctx.start()

  try {
    const subject = new LoadableSubject<LazyList<Country>>()
    const result = settled(subject)

    ctx.services.domains.countries.countriesService.loadCountries(
      subject,
      input.search,
      input.locale,
    )

    const state = await result

    if (state.kind === "loaded") {
      logger.info("Countries loaded", { search: input.search, count: state.value.length })
    } else {
      logger.warn("Countries search failed", { search: input.search })
    }

    return state
  } finally {
    await ctx.stop()
  }
}
