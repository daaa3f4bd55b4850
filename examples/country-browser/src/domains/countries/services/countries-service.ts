import { randomUUID } from "node:crypto"
import type { Clock, Milliseconds } from "@atlas/clock"
import { CancellationError, throwIfCancelled } from "@atlas/errors"
import {
  ensureTimeSpan,
  type LazyList,
  type LoadableSubject,
  loadInto,
} from "@atlas/loadable"
import type { Logger } from "@atlas/logger"
import type { Singleflight } from "@atlas/singleflight"
import { COUNTRIES_LIST_FLIGHT, countryDetailsFlight } from "../keyspace"
import { StorageError } from "../model/countries.errors"
import type { Country, CountryDetails } from "../model/country.model"
import type { CountriesDbRepository } from "./countries-db-repository"
import type { CountriesWebRepository } from "./countries-web-repository"

/**
 * Loads country data into {@link LoadableSubject}s, serving from the local
 * store and refreshing it from the remote source when needed.
 */
export interface CountriesService {
  /** Fetch the full list and replace the stored one. */
  refreshCountriesList(signal?: AbortSignal): Promise<void>

  loadCountries(subject: LoadableSubject<LazyList<Country>>, search: string, locale: string): void

  loadCountryDetails(subject: LoadableSubject<CountryDetails>, country: Country): void
}

export type RealCountriesServiceDeps = {
  webRepository: CountriesWebRepository
  dbRepository: CountriesDbRepository
  singleflight: Singleflight
  clock: Clock
  logger: Logger
}

export type RealCountriesServiceOptions = {
  /** Remote results are not delivered sooner than this after the fetch started. */
  refreshFloorMs: Milliseconds

  /** Share one remote fetch and store write between concurrent loads of the same query. */
  coalesceRequests: boolean
}

/** One coalesced flight and the number of callers still waiting on it. */
type SharedFlight = {
  controller: AbortController
  waiters: number
}

export class RealCountriesService implements CountriesService {
  private readonly logger: Logger
  private readonly flights = new Map<string, SharedFlight>()

  constructor(
    private readonly deps: RealCountriesServiceDeps,
    private readonly opts: RealCountriesServiceOptions,
  ) {
    this.logger = deps.logger.child({ module: "countries" })
  }

  loadCountries(
    subject: LoadableSubject<LazyList<Country>>,
    search: string,
    locale: string,
  ): void {
    const { dbRepository } = this.deps

    loadInto(
      subject,
      async (signal) => {
        const hasLoaded = await dbRepository.hasLoadedCountries()
        throwIfCancelled(signal)

        if (!hasLoaded) {
          await this.refresh(signal)
          throwIfCancelled(signal)
        }

        return dbRepository.countries(search, locale)
      },
      { logger: this.pipelineLogger(COUNTRIES_LIST_FLIGHT), clock: this.deps.clock },
    )
  }

  async refreshCountriesList(signal?: AbortSignal): Promise<void> {
    await this.refresh(signal)
  }

  loadCountryDetails(subject: LoadableSubject<CountryDetails>, country: Country): void {
    const { dbRepository, webRepository } = this.deps
    const flight = countryDetailsFlight(country.alpha3Code)

    loadInto(
      subject,
      async (signal) => {
        const cached = await dbRepository.countryDetails(country)
        if (cached) return cached
        throwIfCancelled(signal)

        await this.coalesce(flight, signal, async (flightSignal) => {
          const payload = await this.holdBack(
            () => webRepository.loadCountryDetails(country, flightSignal),
            flightSignal,
          )
          throwIfCancelled(flightSignal)

          await dbRepository.storeCountryDetails(payload, country)
        })
        throwIfCancelled(signal)

        const details = await dbRepository.countryDetails(country)
        if (!details) throw StorageError.detailsMissing(country.alpha3Code)

        return details
      },
      { logger: this.pipelineLogger(flight), clock: this.deps.clock },
    )
  }

  private async refresh(signal: AbortSignal | undefined): Promise<void> {
    const { dbRepository, webRepository } = this.deps

    await this.coalesce(COUNTRIES_LIST_FLIGHT, signal, async (flightSignal) => {
      const countries = await this.holdBack(
        () => webRepository.loadCountries(flightSignal),
        flightSignal,
      )
      throwIfCancelled(flightSignal)

      await dbRepository.storeCountries(countries)

      this.logger.info("countries list refreshed", { count: countries.length })
    })
  }

  private holdBack<T>(work: () => Promise<T>, signal: AbortSignal | undefined): Promise<T> {
    return ensureTimeSpan(work, {
      clock: this.deps.clock,
      floorMs: this.opts.refreshFloorMs,
      ...(signal && { signal }),
    })
  }

  /**
   * Run `work` once per key across concurrent callers. The shared work gets
   * a signal of its own, aborted once every caller waiting on it has aborted.
   */
  private async coalesce(
    key: string,
    signal: AbortSignal | undefined,
    work: (signal: AbortSignal | undefined) => Promise<void>,
  ): Promise<void> {
    throwIfCancelled(signal)
    if (!this.opts.coalesceRequests) return work(signal)

    const shared = this.joinFlight(key)
    let waiting = true
    const leave = (abandoned: boolean) => {
      if (!waiting) return
      waiting = false
      this.leaveFlight(key, shared, abandoned)
    }
    const abandon = () => leave(true)

    signal?.addEventListener("abort", abandon, { once: true })

    try {
      const flight = await this.deps.singleflight.run(key, () => work(shared.controller.signal))

      this.logger.debug(flight.isLeader ? "flight completed" : "flight joined", {
        query: key,
        sharedWith: flight.sharedWith,
      })
    } catch (err) {
      throwIfCancelled(signal)
      throw err
    } finally {
      signal?.removeEventListener("abort", abandon)
      leave(false)
    }

    throwIfCancelled(signal)
  }

  private joinFlight(key: string): SharedFlight {
    let shared = this.flights.get(key)

    if (!shared) {
      shared = { controller: new AbortController(), waiters: 0 }
      this.flights.set(key, shared)
    }

    shared.waiters++
    return shared
  }

  /** The last caller out aborts the work if it gave up on it. */
  private leaveFlight(key: string, shared: SharedFlight, abandoned: boolean): void {
    shared.waiters--
    if (shared.waiters > 0 || this.flights.get(key) !== shared) return

    this.flights.delete(key)
    if (!abandoned) return

    shared.controller.abort(new CancellationError())
    this.deps.singleflight.forget(key)
  }

  private pipelineLogger(query: string): Logger {
    return this.logger.child({ query, pipelineId: randomUUID() })
  }
}
