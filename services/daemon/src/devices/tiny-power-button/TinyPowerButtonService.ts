import type {
  PowerSignal,
  SignalSender,
  TinyPowerButtonConfig,
  TinyPowerButtonEventSink,
} from './types'

export class TinyPowerButtonService {
  private readonly cfg: TinyPowerButtonConfig
  private readonly sender: SignalSender
  private readonly events: TinyPowerButtonEventSink
  private readonly clock: () => number

  private sent = 0

  constructor(
    cfg: TinyPowerButtonConfig,
    deps: { sender: SignalSender; events: TinyPowerButtonEventSink; clock?: () => number }
  ) {
    this.cfg = { ...cfg }
    this.sender = deps.sender
    this.events = deps.events
    this.clock = deps.clock ?? Date.now
  }

  public isEnabled(): boolean {
    return this.cfg.enabled
  }

  public getSignal(): PowerSignal {
    return this.cfg.signal
  }

  public getPid(): number {
    return this.cfg.pid
  }

  public getSent(): number {
    return this.sent
  }

  /** Returns true when the signal was sent. The notification code is not inspected. */
  public notify(event = 0x80): boolean {
    const at = this.clock()
    const { pid, signal } = this.cfg

    if (!this.cfg.enabled) {
      this.events.publish({ kind: 'power-signal-skipped', at, reason: 'disabled' })
      return false
    }

    try {
      this.sender.send(pid, signal)
    } catch (err) {
      this.events.publish({
        kind: 'power-signal-failed',
        at,
        pid,
        signal,
        message: err instanceof Error ? err.message : String(err),
      })
      return false
    }

    this.sent += 1
    this.events.publish({ kind: 'power-signal-sent', at, pid, signal, event })
    return true
  }
}
