export type SignalListener = () => void

/**
 * Where OS signals come from. `process` satisfies it; tests pass an
 * EventEmitter.
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: SignalListener): unknown
  off(event: NodeJS.Signals, listener: SignalListener): unknown
}
