import { z } from "zod"

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined)

export const countrySchema = z.object({
  name: z.string().min(1),
  translations: z.record(z.string(), z.string().nullable()).default({}),
  population: z.number().int().nonnegative(),
  flag: optionalText,
  alpha3Code: z.string().length(3),
})

export const countryListSchema = z.array(countrySchema)

export const currencySchema = z.object({
  code: z.string().min(1),
  symbol: optionalText,
  name: optionalText,
})

export const countryDetailsPayloadSchema = z.object({
  capital: z.string().default(""),
  currencies: z.array(currencySchema).default([]),
  borders: z.array(z.string()).default([]),
})
