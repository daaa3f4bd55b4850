const COUNTRIES_LIST_NS = "countries:list"
const COUNTRIES_DETAILS_NS = "countries:details"

export function countriesListKeyspace(prefix: string): string {
  return `${prefix}:${COUNTRIES_LIST_NS}`
}

export function countriesDetailsKeyspace(prefix: string): string {
  return `${prefix}:${COUNTRIES_DETAILS_NS}`
}

/** Coalescing key for the full list fetch. */
export const COUNTRIES_LIST_FLIGHT = COUNTRIES_LIST_NS

export function countryDetailsFlight(alpha3Code: string): string {
  return `${COUNTRIES_DETAILS_NS}:${alpha3Code}`
}
