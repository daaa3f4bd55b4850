import type { LazyList, LoadableSubject } from "@atlas/loadable"
import type { Country, CountryDetails } from "../model/country.model"
import type { CountriesService } from "./countries-service"

/** Does nothing: subjects stay NotRequested. For previews and UI tests. */
export class StubCountriesService implements CountriesService {
  async refreshCountriesList(): Promise<void> {}

  loadCountries(_subject: LoadableSubject<LazyList<Country>>, _search: string, _locale: string): void {}

  loadCountryDetails(_subject: LoadableSubject<CountryDetails>, _country: Country): void {}
}
