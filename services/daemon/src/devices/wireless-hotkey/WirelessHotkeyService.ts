export const HOTKEY_NOTIFY_STATUS = 0x80

export interface HotkeyEventSink {
  publish(evt: HotkeyEvent): void
}

export type HotkeyEvent =
  | { kind: 'hotkey-key'; at: number; key: 'KEY_RFKILL'; pressed: boolean }
  | { kind: 'hotkey-unknown-event'; at: number; event: number }

/** Wireless radio hotkey: one status notification is one rfkill tap. */
export class WirelessHotkeyService {
  private readonly events: HotkeyEventSink
  private readonly clock: () => number
  private taps = 0

  constructor(deps: { events: HotkeyEventSink; clock?: () => number }) {
    this.events = deps.events
    this.clock = deps.clock ?? Date.now
  }

  public notify(event: number = HOTKEY_NOTIFY_STATUS): boolean {
    const at = this.clock()

    if (event !== HOTKEY_NOTIFY_STATUS) {
      this.events.publish({ kind: 'hotkey-unknown-event', at, event })
      return false
    }

    this.events.publish({ kind: 'hotkey-key', at, key: 'KEY_RFKILL', pressed: true })
    this.events.publish({ kind: 'hotkey-key', at, key: 'KEY_RFKILL', pressed: false })
    this.taps += 1
    return true
  }

  public getTaps(): number {
    return this.taps
  }
}
