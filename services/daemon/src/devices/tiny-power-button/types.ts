/* -------------------------------------------------------------------------- */
/*  TinyPowerButtonService                                                    */
/*                                                                            */
/*  Minimal power button: every notification, whatever its code, sends one    */
/*  configured signal to the init process. No key events, no suspend gate.    */
/* -------------------------------------------------------------------------- */

/** Signal name or number as accepted by process.kill. */
export type PowerSignal = NodeJS.Signals | number

/** SIGRTMIN+4 on Linux: systemd's orderly poweroff request. */
export const DEFAULT_POWER_SIGNAL: PowerSignal = 38

export const DEFAULT_SIGNAL_TARGET_PID = 1

export interface TinyPowerButtonConfig {
  enabled: boolean
  signal: PowerSignal
  pid: number
}

export interface SignalSender {
  send(pid: number, signal: PowerSignal): void
}

export interface TinyPowerButtonEventSink {
  publish(evt: TinyPowerButtonEvent): void
}

export type TinyPowerButtonEvent =
  | { kind: 'power-signal-sent'; at: number; pid: number; signal: PowerSignal; event: number }
  | { kind: 'power-signal-failed'; at: number; pid: number; signal: PowerSignal; message: string }
  | { kind: 'power-signal-skipped'; at: number; reason: 'disabled' }
