export { type AppContext, type AppContextOptions, createAppContext } from "./app/create-context"
export { type AppConfig, loadAppConfig } from "./app/config"
export {
  DecodingError,
  NetworkError,
  StorageError,
} from "./domains/countries/model/countries.errors"
export type {
  Alpha3Code,
  CountriesQuery,
  Country,
  CountryDetails,
  CountryDetailsPayload,
  Currency,
} from "./domains/countries/model/country.model"
export {
  type CountriesDbRepository,
  KvCountriesDbRepository,
} from "./domains/countries/services/countries-db-repository"
export {
  type CountriesService,
  RealCountriesService,
} from "./domains/countries/services/countries-service"
export {
  type CountriesWebRepository,
  HttpCountriesWebRepository,
} from "./domains/countries/services/countries-web-repository"
export { StubCountriesService } from "./domains/countries/services/stub-countries-service"
export { run, type SearchInput } from "./run"
