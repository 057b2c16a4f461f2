import type {
  ButtonEventSink,
  ButtonKind,
  ButtonPlatform,
} from './types'
import { BUTTON_KEYS, BUTTON_NOTIFY_STATUS } from './types'

export class ButtonRelayService {
  private readonly kind: ButtonKind
  private readonly platform: ButtonPlatform
  private readonly events: ButtonEventSink
  private readonly clock: () => number

  private suspended = false
  private pushed = 0

  constructor(
    kind: ButtonKind,
    deps: { platform: ButtonPlatform; events: ButtonEventSink; clock?: () => number }
  ) {
    this.kind = kind
    this.platform = deps.platform
    this.events = deps.events
    this.clock = deps.clock ?? Date.now
  }

  public getKind(): ButtonKind {
    return this.kind
  }

  public getPushed(): number {
    return this.pushed
  }

  public isSuspended(): boolean {
    return this.suspended
  }

  /** Returns true when a key press was delivered. */
  public notify(event: number = BUTTON_NOTIFY_STATUS): boolean {
    const at = this.clock()

    if (event !== BUTTON_NOTIFY_STATUS) {
      this.events.publish({ kind: 'button-unsupported-event', at, button: this.kind, event })
      return false
    }

    this.platform.signalWakeup(this.kind)

    if (this.suspended) {
      this.events.publish({ kind: 'button-suppressed', at, button: this.kind, reason: 'suspended' })
      return false
    }

    const key = BUTTON_KEYS[this.kind]
    this.events.publish({ kind: 'button-key', at, button: this.kind, key, pressed: true })
    this.events.publish({ kind: 'button-key', at, button: this.kind, key, pressed: false })

    this.pushed += 1
    this.events.publish({ kind: 'button-pressed', at, button: this.kind, pushed: this.pushed })
    return true
  }

  public suspend(): void {
    this.setSuspended(true)
  }

  public resume(): void {
    this.setSuspended(false)
  }

  private setSuspended(v: boolean): void {
    if (this.suspended === v) return
    this.suspended = v
    this.events.publish({
      kind: 'button-suspend-changed',
      at: this.clock(),
      button: this.kind,
      suspended: v,
    })
  }
}
