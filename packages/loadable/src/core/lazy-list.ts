export type LazyListOptions = {
  /** Produce each element at most once. */
  memoize?: boolean
}

/**
 * Finite sequence whose elements are produced on demand from their index.
 * Can be iterated any number of times; `map` stays lazy.
 */
export class LazyList<T> implements Iterable<T> {
  private readonly memo: Map<number, { value: T }> | undefined

  constructor(
    readonly length: number,
    private readonly produce: (index: number) => T,
    opts: LazyListOptions = {},
  ) {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`LazyList length must be a non-negative integer, got ${length}`)
    }

    this.memo = opts.memoize ? new Map() : undefined
  }

  static empty<T>(): LazyList<T> {
    return new LazyList<T>(0, () => {
      throw new RangeError("LazyList is empty")
    })
  }

  static from<T>(items: readonly T[]): LazyList<T>
  static from<S, T>(
    items: readonly S[],
    transform: (item: S, index: number) => T,
    opts?: LazyListOptions,
  ): LazyList<T>
  static from<S, T>(
    items: readonly S[],
    transform?: (item: S, index: number) => T,
    opts?: LazyListOptions,
  ): LazyList<S> | LazyList<T> {
    const source = [...items]

    if (!transform) return new LazyList(source.length, (i) => source[i])

    return new LazyList(source.length, (i) => transform(source[i], i), opts)
  }

  get isEmpty(): boolean {
    return this.length === 0
  }

  /** `undefined` outside `[0, length)`. */
  at(index: number): T | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) return undefined

    return this.get(index)
  }

  map<U>(fn: (item: T, index: number) => U, opts?: LazyListOptions): LazyList<U> {
    return new LazyList(this.length, (i) => fn(this.get(i), i), opts)
  }

  toArray(): T[] {
    return [...this]
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.length; i++) {
      yield this.get(i)
    }
  }

  private get(index: number): T {
    if (!this.memo) return this.produce(index)

    const hit = this.memo.get(index)
    if (hit) return hit.value

    const value = this.produce(index)
    this.memo.set(index, { value })
    return value
  }
}
