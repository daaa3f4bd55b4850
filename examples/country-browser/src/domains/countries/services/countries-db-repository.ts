import type { KeyValueStore } from "@atlas/kv"
import { LazyList } from "@atlas/loadable"
import { StorageError } from "../model/countries.errors"
import type {
  Alpha3Code,
  Country,
  CountryDetails,
  CountryDetailsPayload,
  Currency,
} from "../model/country.model"

/** What is persisted per country; neighbors are resolved on read. */
export type StoredCountryDetails = {
  capital: string
  currencies: Currency[]
  borders: Alpha3Code[]
}

/**
 * Local store of countries and their details. Every failure surfaces as a
 * {@link StorageError}.
 */
export interface CountriesDbRepository {
  hasLoadedCountries(): Promise<boolean>
  storeCountries(countries: readonly Country[]): Promise<void>

  /**
   * Countries whose default or localised name contains `search`, ignoring
   * case and diacritics, ordered by localised name. An empty search matches
   * every country.
   */
  countries(search: string, locale: string): Promise<LazyList<Country>>

  countryDetails(country: Country): Promise<CountryDetails | null>
  storeCountryDetails(payload: CountryDetailsPayload, country: Country): Promise<void>
}

export type KvCountriesDbRepositoryDeps = {
  countriesKv: KeyValueStore<Country[]>
  detailsKv: KeyValueStore<StoredCountryDetails>
}

const LIST_KEY = "all"

export class KvCountriesDbRepository implements CountriesDbRepository {
  constructor(private readonly deps: KvCountriesDbRepositoryDeps) {}

  async hasLoadedCountries(): Promise<boolean> {
    return this.guard("check for countries", () => this.deps.countriesKv.has(LIST_KEY))
  }

  async storeCountries(countries: readonly Country[]): Promise<void> {
    await this.guard("store countries", () =>
      this.deps.countriesKv.set(LIST_KEY, [...countries]),
    )
  }

  async countries(search: string, locale: string): Promise<LazyList<Country>> {
    const stored = await this.readCountries()

    const language = languageOf(locale)
    const needle = fold(search.trim())
    const nameOf = (country: Country) => localizedName(country, language)

    const matches =
      needle === ""
        ? [...stored]
        : stored.filter(
            (country) =>
              fold(nameOf(country)).includes(needle) || fold(country.name).includes(needle),
          )

    const collator = collatorFor(locale)
    matches.sort((a, b) => collator.compare(nameOf(a), nameOf(b)))

    return LazyList.from(matches, toCountry, { memoize: true })
  }

  async countryDetails(country: Country): Promise<CountryDetails | null> {
    const stored = await this.guard("read country details", () =>
      this.deps.detailsKv.get(country.alpha3Code),
    )

    if (stored.kind === "not_found") return null

    const byCode = new Map((await this.readCountries()).map((c) => [c.alpha3Code, c]))

    const neighbors = stored.value.borders.flatMap((code) => {
      const neighbor = byCode.get(code)
      return neighbor ? [neighbor] : []
    })

    return {
      capital: stored.value.capital,
      currencies: stored.value.currencies,
      neighbors,
    }
  }

  async storeCountryDetails(payload: CountryDetailsPayload, country: Country): Promise<void> {
    const stored: StoredCountryDetails = {
      capital: payload.capital,
      currencies: payload.currencies,
      borders: payload.borders,
    }

    await this.guard("store country details", () =>
      this.deps.detailsKv.set(country.alpha3Code, stored),
    )
  }

  private async readCountries(): Promise<Country[]> {
    const res = await this.guard("read countries", () => this.deps.countriesKv.get(LIST_KEY))

    return res.kind === "found" ? res.value : []
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw StorageError.failed({ operation, cause: err })
    }
  }
}

function toLanguageTag(locale: string): string {
  return locale.replaceAll("_", "-")
}

/** A malformed locale sorts with the default collation. */
function collatorFor(locale: string): Intl.Collator {
  try {
    return new Intl.Collator(toLanguageTag(locale))
  } catch (err) {
    if (err instanceof RangeError) return new Intl.Collator()
    throw err
  }
}

function languageOf(locale: string): string {
  return toLanguageTag(locale).split("-")[0].toLowerCase()
}

function localizedName(country: Country, language: string): string {
  const { translations } = country
  const translated = Object.hasOwn(translations, language) ? translations[language] : null

  return translated ?? country.name
}

/** Detached copy of a stored entry, so callers never share the store's objects. */
function toCountry(stored: Country): Country {
  return { ...stored, translations: { ...stored.translations } }
}

/** Lower-case and strip combining marks, so `Åland` matches `aland`. */
function fold(value: string): string {
  return value.normalize("NFD").replace(/\p{M}/gu, "").toLowerCase()
}
