export type LifecycleHook = {
  name: string
  fn: () => Promise<void>
}
