import { fileURLToPath } from "node:url"
import { applyOverrides, type DeepPartial } from "@atlas/config"
import { serializeError } from "@atlas/errors"
import { type AppConfig, loadAppConfig } from "./config"
import type { LifecycleHook } from "./lifecycle/hooks"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type AppServices, createDefaultDomainServices, type DomainServices } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"
import { createDefaultInfraClients, type InfraClients } from "./services/infra"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  configOverrides?: DeepPartial<AppConfig>
  infraOverrides?: DeepPartial<InfraClients>
  coreOverrides?: DeepPartial<CoreServices>
  domainOverrides?: DeepPartial<DomainServices>
}

export type AppContext = {
  config: AppConfig
  infra: InfraClients
  services: AppServices
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn

  /** Run the start hooks in order. */
  start: () => Promise<void>

  /** Run every stop hook, even when an earlier one fails; rethrows the first failure. */
  stop: () => Promise<void>
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const projectRoot = fileURLToPath(new URL("../..", import.meta.url))

  const config = await loadAppConfig(
    options.env ?? process.env,
    options.configOverrides,
    projectRoot,
  )

  const baseInfra = createDefaultInfraClients(config)
  const infra = applyOverrides(baseInfra, options.infraOverrides)

  const baseCore = createCoreServices(config)
  const core = applyOverrides(baseCore, options.coreOverrides)

  const baseDomains = createDefaultDomainServices(config, infra, core)
  const domains = applyOverrides(baseDomains, options.domainOverrides)

  const services = { core, domains }

  const context: AppContext = {
    config,
    infra,
    services,
    createStartHooks,
    createStopHooks,
    start: async () => {
      for (const hook of context.createStartHooks(context)) {
        await runHook(context, hook)
      }
    },
    stop: async () => {
      let firstError: unknown

      for (const hook of context.createStopHooks(context)) {
        try {
          await runHook(context, hook)
        } catch (err) {
          firstError ??= err
        }
      }

      if (firstError !== undefined) throw firstError
    },
  }

  return context
}

async function runHook(context: AppContext, hook: LifecycleHook): Promise<void> {
  const { logger } = context.services.core

  try {
    await hook.fn()
    logger.debug("lifecycle hook completed", { hook: hook.name })
  } catch (err) {
    logger.error("lifecycle hook failed", { hook: hook.name, err: serializeError(err) })
    throw err
  }
}
