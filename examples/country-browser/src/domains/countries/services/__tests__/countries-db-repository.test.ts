import { FakeClock } from "@atlas/clock"
import { createMemoryKeyValueStore, type KeyValueStore } from "@atlas/kv"
import { mock } from "vitest-mock-extended"
import { createJsonCodec } from "../../../../lib"
import {
  alandIslands,
  belgium,
  countries,
  france,
  franceDetails,
  franceDetailsPayload,
  germany,
  spain,
} from "../../../../tests/fixtures"
import { StorageError } from "../../model/countries.errors"
import type { Country } from "../../model/country.model"
import { KvCountriesDbRepository, type StoredCountryDetails } from "../countries-db-repository"

describe("KvCountriesDbRepository", () => {
  let repository: KvCountriesDbRepository

  beforeEach(() => {
    const clock = new FakeClock()

    repository = new KvCountriesDbRepository({
      countriesKv: createMemoryKeyValueStore({ clock, codec: createJsonCodec<Country[]>() }),
      detailsKv: createMemoryKeyValueStore({
        clock,
        codec: createJsonCodec<StoredCountryDetails>(),
      }),
    })
  })

  const codes = (list: Iterable<Country>) => [...list].map((c) => c.alpha3Code)

  describe("hasLoadedCountries", () => {
    it("is false until countries are stored", async () => {
      expect(await repository.hasLoadedCountries()).toBe(false)

      await repository.storeCountries(countries)

      expect(await repository.hasLoadedCountries()).toBe(true)
    })

    it("is true after storing an empty list", async () => {
      await repository.storeCountries([])

      expect(await repository.hasLoadedCountries()).toBe(true)
    })
  })

  describe("countries", () => {
    beforeEach(async () => {
      await repository.storeCountries(countries)
    })

    it("returns nothing before any countries are stored", async () => {
      const empty = new KvCountriesDbRepository({
        countriesKv: createMemoryKeyValueStore({
          clock: new FakeClock(),
          codec: createJsonCodec<Country[]>(),
        }),
        detailsKv: createMemoryKeyValueStore({
          clock: new FakeClock(),
          codec: createJsonCodec<StoredCountryDetails>(),
        }),
      })

      const result = await empty.countries("", "en")

      expect(result.isEmpty).toBe(true)
    })

    it("returns every country for an empty search, ordered by name", async () => {
      const result = await repository.countries("", "en")

      expect(codes(result)).toStrictEqual(["ALA", "BEL", "FRA", "DEU", "ESP"])
    })

    it("orders by the name localised for the locale's language", async () => {
      const result = await repository.countries("", "de_DE")

      expect(codes(result)).toStrictEqual(["ALA", "BEL", "DEU", "FRA", "ESP"])
    })

    it("falls back to the default name when a translation is missing", async () => {
      const result = await repository.countries("", "es")

      expect(codes(result)).toStrictEqual(["ALA", "DEU", "BEL", "ESP", "FRA"])
    })

    it("ignores case and diacritics", async () => {
      expect(codes(await repository.countries("ALAND", "en"))).toStrictEqual(["ALA"])
      expect(codes(await repository.countries("espana", "es"))).toStrictEqual(["ESP"])
    })

    it("matches the localised name", async () => {
      const result = await repository.countries("deutsch", "de")

      expect(codes(result)).toStrictEqual(["DEU"])
    })

    it("also matches the default name", async () => {
      const result = await repository.countries("germany", "fr")

      expect(codes(result)).toStrictEqual(["DEU"])
    })

    it("trims the search", async () => {
      const result = await repository.countries("  fran ", "en")

      expect(result.toArray()).toEqual([france])
    })

    it("builds each country only when it is first read", async () => {
      let flagReads = 0
      const stored: Country = {
        name: "France",
        translations: {},
        population: 67_000_000,
        get flag() {
          flagReads++
          return "fr.svg"
        },
        alpha3Code: "FRA",
      }
      const countriesKv = mock<KeyValueStore<Country[]>>()
      countriesKv.get.mockResolvedValue({ kind: "found", value: [stored] })
      const lazy = new KvCountriesDbRepository({
        countriesKv,
        detailsKv: mock<KeyValueStore<StoredCountryDetails>>(),
      })

      const result = await lazy.countries("fra", "en")
      expect(flagReads).toBe(0)

      result.at(0)
      result.at(0)

      expect(flagReads).toBe(1)
      expect(result.at(0)).not.toBe(stored)
    })

    it("ignores translation keys inherited from Object.prototype", async () => {
      const result = await repository.countries("fran", "constructor")

      expect(codes(result)).toStrictEqual(["FRA"])
    })

    it("returns an empty list when nothing matches", async () => {
      const result = await repository.countries("atlantis", "en")

      expect(result.length).toBe(0)
    })
  })

  describe("country details", () => {
    it("are null until stored", async () => {
      expect(await repository.countryDetails(france)).toBeNull()
    })

    it("resolve border codes to stored countries and skip unknown ones", async () => {
      await repository.storeCountries(countries)
      await repository.storeCountryDetails(franceDetailsPayload, france)

      const details = await repository.countryDetails(france)

      expect(details).toEqual(franceDetails)
    })

    it("have no neighbors when the country list is missing", async () => {
      await repository.storeCountryDetails(franceDetailsPayload, france)

      const details = await repository.countryDetails(france)

      expect(details?.neighbors).toStrictEqual([])
      expect(details?.capital).toBe("Paris")
    })

    it("are stored per country", async () => {
      await repository.storeCountryDetails(franceDetailsPayload, france)

      expect(await repository.countryDetails(spain)).toBeNull()
      expect(await repository.countryDetails(germany)).toBeNull()
      expect(await repository.countryDetails(belgium)).toBeNull()
      expect(await repository.countryDetails(alandIslands)).toBeNull()
    })
  })

  describe("store failures", () => {
    it("are wrapped in a StorageError that keeps the cause", async () => {
      const cause = new Error("connection reset")
      const countriesKv = mock<KeyValueStore<Country[]>>()
      countriesKv.has.mockRejectedValue(cause)

      const failing = new KvCountriesDbRepository({
        countriesKv,
        detailsKv: mock<KeyValueStore<StoredCountryDetails>>(),
      })

      const err = await failing.hasLoadedCountries().catch((e: unknown) => e)

      expect(err).toBeInstanceOf(StorageError)
      expect(err).toMatchObject({
        code: "storage_error",
        context: { operation: "check for countries" },
        cause,
      })
    })
  })
})
