import { constants } from 'node:os'
import {
  DEFAULT_POWER_SIGNAL,
  DEFAULT_SIGNAL_TARGET_PID,
  type PowerSignal,
  type TinyPowerButtonConfig,
} from './types'

const MAX_SIGNAL_NUMBER = 64

function isSignalName(v: string): v is NodeJS.Signals {
  return Object.prototype.hasOwnProperty.call(constants.signals, v)
}

/** Accepts `38`, `SIGTERM`, `term`; null when unusable. */
export function parsePowerSignal(raw: string): PowerSignal | null {
  const t = raw.trim()
  if (/^\d+$/.test(t)) {
    const n = Number.parseInt(t, 10)
    return n >= 1 && n <= MAX_SIGNAL_NUMBER ? n : null
  }
  const upper = t.toUpperCase()
  const name = upper.startsWith('SIG') ? upper : `SIG${upper}`
  return isSignalName(name) ? name : null
}

export function buildTinyPowerButtonConfigFromEnv(env: NodeJS.ProcessEnv): TinyPowerButtonConfig {
  const enabled = String(env.TINY_POWER_BUTTON ?? 'false').trim().toLowerCase() === 'true'

  const rawSignal = env.POWER_BUTTON_SIGNAL
  const signal = rawSignal ? parsePowerSignal(rawSignal) ?? DEFAULT_POWER_SIGNAL : DEFAULT_POWER_SIGNAL

  const pid = Number.parseInt(env.POWER_BUTTON_PID ?? '', 10)

  return {
    enabled,
    signal,
    pid: Number.isInteger(pid) && pid > 0 ? pid : DEFAULT_SIGNAL_TARGET_PID,
  }
}
