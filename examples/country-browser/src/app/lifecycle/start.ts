import type { AppContext } from "../create-context"
import type { LifecycleHook } from "./hooks"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const { redisClient } = context.infra
  if (!redisClient) return []

  return [
    {
      name: "start:redis",
      fn: async () => {
        if (!redisClient.isOpen) await redisClient.connect()
      },
    },
  ]
}

export type CreateStartHooksFn = typeof createStartHooks
