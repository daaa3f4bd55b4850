import type { RedisBytesClient } from "@atlas/kv"
import { createNullLogger } from "@atlas/logger"
import { mock } from "vitest-mock-extended"
import { RealCountriesService } from "../../domains/countries/services/countries-service"
import { createAppContext } from "../create-context"

describe("createAppContext", () => {
  const logger = createNullLogger()

  it("wires the countries service over an in-memory store by default", async () => {
    const ctx = await createAppContext({ env: {}, coreOverrides: { logger } })

    expect(ctx.infra.redisClient).toBeNull()
    expect(ctx.services.core.logger).toBe(logger)
    expect(ctx.services.domains.countries.countriesService).toBeInstanceOf(RealCountriesService)
    expect(ctx.createStartHooks(ctx)).toStrictEqual([])

    await ctx.start()
    await ctx.stop()
  })

  it("creates a Redis client for the redis driver without connecting it", async () => {
    const ctx = await createAppContext({
      env: { STORE_DRIVER: "redis" },
      coreOverrides: { logger },
    })

    expect(ctx.infra.redisClient).not.toBeNull()
    expect(ctx.infra.redisClient?.isOpen).toBe(false)
  })

  it("connects and quits Redis through the lifecycle hooks", async () => {
    const redisClient = mock<RedisBytesClient>({ isOpen: false })

    const ctx = await createAppContext({
      env: { STORE_DRIVER: "redis" },
      coreOverrides: { logger },
      infraOverrides: { redisClient },
    })

    await ctx.start()
    expect(redisClient.connect).toHaveBeenCalledTimes(1)

    const open = mock<RedisBytesClient>({ isOpen: true })
    const stopping = await createAppContext({
      env: { STORE_DRIVER: "redis" },
      coreOverrides: { logger },
      infraOverrides: { redisClient: open },
    })

    await stopping.stop()
    expect(open.quit).toHaveBeenCalledTimes(1)
  })

  it("rethrows a failing stop hook", async () => {
    const redisClient = mock<RedisBytesClient>({ isOpen: true })
    redisClient.quit.mockRejectedValue(new Error("quit failed"))

    const ctx = await createAppContext({
      env: {},
      coreOverrides: { logger },
      infraOverrides: { redisClient },
    })

    await expect(ctx.stop()).rejects.toThrow("quit failed")
  })

  it("applies config overrides", async () => {
    const ctx = await createAppContext({
      env: {},
      coreOverrides: { logger },
      configOverrides: { countries: { refreshFloorMs: 0 } },
    })

    expect(ctx.config.countries.refreshFloorMs).toBe(0)
  })
})
