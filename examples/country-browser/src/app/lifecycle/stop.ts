import type { AppContext } from "../create-context"
import type { LifecycleHook } from "./hooks"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  const { redisClient } = context.infra
  if (!redisClient) return []

  return [
    {
      name: "stop:redis",
      fn: async () => {
        if (redisClient.isOpen) await redisClient.quit()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
