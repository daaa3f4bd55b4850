import { CancelBag } from "../cancel-bag"
import {
  errorOf,
  failed,
  isLoading,
  loaded,
  loading,
  mapLoadable,
  notRequested,
  valueOf,
} from "../loadable-state"

describe("LoadableState helpers", () => {
  const bag = new CancelBag()

  it("loading() omits previous when there is none", () => {
    expect(loading(undefined, bag)).toStrictEqual({ kind: "loading", cancelBag: bag })
    expect(loading(3, bag)).toStrictEqual({ kind: "loading", previous: 3, cancelBag: bag })
  })

  it("valueOf() reads loaded values and previous values", () => {
    expect(valueOf(loaded("a"))).toBe("a")
    expect(valueOf(loading("b", bag))).toBe("b")
    expect(valueOf(loading(undefined, bag))).toBeUndefined()
    expect(valueOf(notRequested())).toBeUndefined()
    expect(valueOf(failed(new Error("x")))).toBeUndefined()
  })

  it("errorOf() reads only failures", () => {
    const error = new Error("x")

    expect(errorOf(failed(error))).toBe(error)
    expect(errorOf(loaded(1))).toBeUndefined()
  })

  it("isLoading() narrows to Loading", () => {
    const state = loading(1, bag)

    expect(isLoading(state)).toBe(true)
    expect(isLoading(loaded(1))).toBe(false)
  })

  it("mapLoadable() maps values and keeps other states", () => {
    const double = (n: number) => n * 2
    const error = new Error("x")

    expect(mapLoadable(loaded(2), double)).toStrictEqual(loaded(4))
    expect(mapLoadable(loading(2, bag), double)).toStrictEqual(loading(4, bag))
    expect(mapLoadable(loading<number>(undefined, bag), double)).toStrictEqual(
      loading(undefined, bag),
    )
    expect(mapLoadable(failed(error), double)).toStrictEqual(failed(error))
    expect(mapLoadable(notRequested(), double)).toStrictEqual(notRequested())
  })
})
