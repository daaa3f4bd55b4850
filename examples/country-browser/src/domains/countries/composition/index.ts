import { createMemoryKeyValueStore, createRedisKeyValueStore, type KeyValueStore } from "@atlas/kv"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import { createJsonCodec } from "../../../lib"
import { countriesDetailsKeyspace, countriesListKeyspace } from "../keyspace"
import type { Country } from "../model/country.model"
import {
  type CountriesDbRepository,
  KvCountriesDbRepository,
  type StoredCountryDetails,
} from "../services/countries-db-repository"
import { type CountriesService, RealCountriesService } from "../services/countries-service"
import {
  type CountriesWebRepository,
  HttpCountriesWebRepository,
} from "../services/countries-web-repository"

export type CountriesServices = {
  webRepository: CountriesWebRepository
  dbRepository: CountriesDbRepository
  countriesService: CountriesService
}

export function createCountriesServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): CountriesServices {
  const countriesKv = createStore<Country[]>(config, core, infra, countriesListKeyspace)
  const detailsKv = createStore<StoredCountryDetails>(config, core, infra, countriesDetailsKeyspace)

  const webRepository = new HttpCountriesWebRepository(
    { fetch: (input, init) => fetch(input, init) },
    { baseUrl: config.countries.apiUrl },
  )

  const dbRepository = new KvCountriesDbRepository({ countriesKv, detailsKv })

  const countriesService = new RealCountriesService(
    {
      webRepository,
      dbRepository,
      singleflight: core.singleflight,
      clock: core.clock,
      logger: core.logger,
    },
    {
      refreshFloorMs: config.countries.refreshFloorMs,
      coalesceRequests: config.countries.coalesceRequests,
    },
  )

  return { webRepository, dbRepository, countriesService }
}

function createStore<T>(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
  keyspace: (prefix: string) => string,
): KeyValueStore<T> {
  const codec = createJsonCodec<T>()

  if (infra.redisClient) {
    return createRedisKeyValueStore<T>({
      client: infra.redisClient,
      codec,
      opts: {
        batchSize: 100,
        keyspacePrefix: `${keyspace(config.redis.keyPrefix)}:`,
      },
    })
  }

  return createMemoryKeyValueStore<T>({
    clock: core.clock,
    codec,
    ...(config.store.maxEntries !== undefined && {
      opts: { maxEntries: config.store.maxEntries },
    }),
  })
}
