/* -------------------------------------------------------------------------- */
/*  ButtonRelayService                                                        */
/*                                                                            */
/*  Power/sleep button notifications -> key press + release.                  */
/*  Suspend gates key delivery; the wake indication is always signalled.      */
/* -------------------------------------------------------------------------- */

export type ButtonKind = 'power' | 'sleep'

export type ButtonKey = 'KEY_POWER' | 'KEY_SLEEP'

export const BUTTON_KEYS: Record<ButtonKind, ButtonKey> = {
  power: 'KEY_POWER',
  sleep: 'KEY_SLEEP',
}

export const BUTTON_NOTIFY_STATUS = 0x80

export interface ButtonPlatform {
  signalWakeup(kind: ButtonKind): void
}

export interface ButtonEventSink {
  publish(evt: ButtonEvent): void
}

export type ButtonEvent =
  | {
      kind: 'button-key'
      at: number
      button: ButtonKind
      key: ButtonKey
      pressed: boolean
    }
  | {
      kind: 'button-pressed'
      at: number
      button: ButtonKind
      /** Running press counter for this button. */
      pushed: number
    }
  | {
      kind: 'button-suppressed'
      at: number
      button: ButtonKind
      reason: 'suspended'
    }
  | {
      kind: 'button-unsupported-event'
      at: number
      button: ButtonKind
      event: number
    }
  | {
      kind: 'button-suspend-changed'
      at: number
      button: ButtonKind
      suspended: boolean
    }

export interface ButtonStateSlice {
  suspended: boolean
  pushed: number
  lastPressAt: number | null
  suppressed: number
  updatedAt: number
}
