import type { Result } from '../lid-switch/types'
import type { HedError, HedEventSink, HedListener } from './types'

/**
 * Forwards hardware-error notifications from the single error device to
 * every registered listener.
 */
export class HardwareErrorRelay {
  private readonly events: HedEventSink
  private readonly clock: () => number

  private deviceId: string | null = null
  private readonly listeners: HedListener[] = []

  constructor(deps: { events: HedEventSink; clock?: () => number }) {
    this.events = deps.events
    this.clock = deps.clock ?? Date.now
  }

  public bind(deviceId: string): Result<string, HedError> {
    if (this.deviceId !== null) {
      return {
        ok: false,
        error: {
          kind: 'duplicate-device',
          message: 'only one hardware error device is supported',
          boundTo: this.deviceId,
        },
      }
    }
    this.deviceId = deviceId
    this.events.publish({ kind: 'hed-bound', at: this.clock(), deviceId })
    return { ok: true, value: deviceId }
  }

  public unbind(): void {
    if (this.deviceId === null) return
    const deviceId = this.deviceId
    this.deviceId = null
    this.events.publish({ kind: 'hed-unbound', at: this.clock(), deviceId })
  }

  public boundDevice(): string | null {
    return this.deviceId
  }

  public register(listener: HedListener): () => void {
    this.listeners.push(listener)
    return () => {
      const i = this.listeners.indexOf(listener)
      if (i >= 0) this.listeners.splice(i, 1)
    }
  }

  public listenerCount(): number {
    return this.listeners.length
  }

  /** Returns the number of listeners called. */
  public notify(): number {
    const at = this.clock()

    if (this.deviceId === null) {
      this.events.publish({ kind: 'hed-notification-ignored', at, reason: 'unbound' })
      return 0
    }

    let called = 0
    let stopped = false
    // snapshot: listeners may unregister themselves mid-chain
    for (const l of [...this.listeners]) {
      called += 1
      try {
        if (l() === 'stop') {
          stopped = true
          break
        }
      } catch (err) {
        this.events.publish({
          kind: 'hed-listener-failed',
          at,
          message: err instanceof Error ? err.message : String(err),
        })
      }
    }

    this.events.publish({ kind: 'hed-notified', at, listenersCalled: called, stopped })
    return called
  }
}
