/** ISO 3166-1 alpha-3 code, e.g. `FRA`. */
export type Alpha3Code = string

export type Country = {
  name: string

  /** Country name keyed by language code; `null` where the source has none. */
  translations: Record<string, string | null>

  population: number
  flag?: string
  alpha3Code: Alpha3Code
}

export type Currency = {
  code: string
  symbol?: string
  name?: string
}

/** Details as the remote API returns them. */
export type CountryDetailsPayload = {
  capital: string
  currencies: Currency[]
  borders: Alpha3Code[]
}

/** Details as the app consumes them, with borders resolved to countries. */
export type CountryDetails = {
  capital: string
  currencies: Currency[]
  neighbors: Country[]
}

export type CountriesQuery = {
  search: string

  /** BCP 47 tag such as `fr-CA`; `_` separators are accepted. */
  locale: string
}
