import type {
  Country,
  CountryDetails,
  CountryDetailsPayload,
} from "../domains/countries/model/country.model"

export const france: Country = {
  name: "France",
  translations: { de: "Frankreich", es: "Francia", fr: "France" },
  population: 67_000_000,
  alpha3Code: "FRA",
}

export const germany: Country = {
  name: "Germany",
  translations: { de: "Deutschland", es: "Alemania", fr: "Allemagne" },
  population: 83_000_000,
  alpha3Code: "DEU",
}

export const spain: Country = {
  name: "Spain",
  translations: { de: "Spanien", es: "España", fr: "Espagne" },
  population: 47_000_000,
  alpha3Code: "ESP",
}

export const belgium: Country = {
  name: "Belgium",
  translations: { de: "Belgien", es: null, fr: "Belgique" },
  population: 11_000_000,
  alpha3Code: "BEL",
}

export const alandIslands: Country = {
  name: "Åland Islands",
  translations: { de: "Åland", es: "Alandia", fr: "Ahvenanmaa" },
  population: 29_000,
  alpha3Code: "ALA",
}

export const countries: Country[] = [france, germany, spain, belgium, alandIslands]

export const franceDetailsPayload: CountryDetailsPayload = {
  capital: "Paris",
  currencies: [{ code: "EUR", symbol: "€", name: "Euro" }],
  borders: ["BEL", "DEU", "ESP", "CHE"],
}

export const franceDetails: CountryDetails = {
  capital: "Paris",
  currencies: [{ code: "EUR", symbol: "€", name: "Euro" }],
  neighbors: [belgium, germany, spain],
}
