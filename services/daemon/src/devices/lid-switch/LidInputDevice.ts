import type { LidState } from './types'

export type LidSwitchListener = (state: LidState) => void

/**
 * Consumer-facing lid switch.
 *
 * Behaves like an input-layer switch: a report equal to the current value is
 * redundant and never reaches listeners.
 */
export class LidInputDevice {
  private current: LidState | null = null
  private readonly listeners = new Set<LidSwitchListener>()

  public report(state: LidState): boolean {
    if (state === this.current) return false
    this.current = state
    for (const l of this.listeners) {
      l(state)
    }
    return true
  }

  public value(): LidState | null {
    return this.current
  }

  public subscribe(listener: LidSwitchListener): () => void {
    this.listeners.add(listener)
    return () => { this.listeners.delete(listener) }
  }

  public reset(): void {
    this.current = null
  }
}
