export type ShutdownHookFn = () => void | Promise<void>

export interface ShutdownHook {
  name: string
  fn: ShutdownHookFn
}
