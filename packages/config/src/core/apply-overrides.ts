export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> | T[P] : T[P]
}

/**
 * Deep-merge `overrides` into a copy of `base`.
 *
 * Only plain object literals are merged. Class instances, arrays, Maps and
 * functions are replaced as a whole, and `undefined` leaves the base value.
 */
export function applyOverrides<T extends object>(base: T, overrides?: DeepPartial<T>): T {
  if (!overrides) return base

  return deepMerge(base, overrides)
}

function deepMerge<T extends object>(base: T, overrides: DeepPartial<T>): T {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(base))

  for (const [key, overrideVal] of Object.entries(overrides)) {
    if (overrideVal === undefined) continue

    const baseVal = result[key]

    result[key] =
      isPlainObject(baseVal) && isPlainObject(overrideVal)
        ? deepMerge(baseVal, overrideVal)
        : overrideVal
  }

  return result as T
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false

  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
