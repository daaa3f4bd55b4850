import { isCancellation } from "@atlas/errors"
import { type ZodType, z } from "zod"
import { DecodingError, NetworkError } from "../model/countries.errors"
import type { Country, CountryDetailsPayload } from "../model/country.model"
import { countryDetailsPayloadSchema, countryListSchema } from "../model/country.schema"

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>

/**
 * Remote source of country data. Implementations honour `signal` by
 * rejecting with an abort or cancellation error.
 */
export interface CountriesWebRepository {
  loadCountries(signal?: AbortSignal): Promise<Country[]>
  loadCountryDetails(country: Country, signal?: AbortSignal): Promise<CountryDetailsPayload>
}

export type HttpCountriesWebRepositoryDeps = {
  fetch: FetchFn
}

export type HttpCountriesWebRepositoryOptions = {
  /** e.g. `https://restcountries.com/v2` */
  baseUrl: string
}

export class HttpCountriesWebRepository implements CountriesWebRepository {
  private readonly baseUrl: string

  constructor(
    private readonly deps: HttpCountriesWebRepositoryDeps,
    opts: HttpCountriesWebRepositoryOptions,
  ) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "")
  }

  async loadCountries(signal?: AbortSignal): Promise<Country[]> {
    return this.getJson("all", countryListSchema, signal)
  }

  async loadCountryDetails(
    country: Country,
    signal?: AbortSignal,
  ): Promise<CountryDetailsPayload> {
    return this.getJson(
      `alpha/${encodeURIComponent(country.alpha3Code)}`,
      countryDetailsPayloadSchema,
      signal,
    )
  }

  private async getJson<T>(path: string, schema: ZodType<T>, signal?: AbortSignal): Promise<T> {
    const url = `${this.baseUrl}/${path}`

    let response: Response
    try {
      response = await this.deps.fetch(url, {
        headers: { accept: "application/json" },
        ...(signal && { signal }),
      })
    } catch (err) {
      if (isCancellation(err)) throw err
      throw NetworkError.transport({ url, cause: err })
    }

    if (!response.ok) throw NetworkError.httpStatus({ url, status: response.status })

    let body: unknown
    try {
      body = await response.json()
    } catch (err) {
      if (isCancellation(err)) throw err
      throw DecodingError.invalidPayload({ url, issues: "body is not JSON", cause: err })
    }

    const result = schema.safeParse(body)
    if (!result.success) {
      throw DecodingError.invalidPayload({
        url,
        issues: z.prettifyError(result.error),
        cause: result.error,
      })
    }

    return result.data
  }
}
