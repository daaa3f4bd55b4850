export type RedisSetOptions = { PX: number } | { KEEPTTL: true }

/**
 * The subset of a node-redis client the byte store needs, with blob replies
 * mapped to `Buffer`.
 */
export type RedisBytesClient = {
  readonly isOpen: boolean
  connect(): Promise<unknown>
  quit(): Promise<unknown>

  get(key: string): Promise<Buffer | null>
  mGet(keys: string[]): Promise<(Buffer | null)[]>
  set(key: string, value: Buffer, opts?: RedisSetOptions): Promise<unknown>
  del(keys: string | string[]): Promise<number>
  exists(keys: string | string[]): Promise<number>

  multi(): RedisBytesMulti
}

export type RedisBytesMulti = {
  set(key: string, value: Buffer, opts?: RedisSetOptions): RedisBytesMulti
  exec(): Promise<unknown>
}
