import {
  type CountriesServices,
  createCountriesServices,
} from "../../domains/countries/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraClients } from "./infra"

export type DomainServices = {
  countries: CountriesServices
}

export type AppServices = {
  core: CoreServices
  domains: DomainServices
}

export function createDefaultDomainServices(
  config: AppConfig,
  infra: InfraClients,
  core: CoreServices,
): DomainServices {
  return {
    countries: createCountriesServices(config, core, infra),
  }
}
